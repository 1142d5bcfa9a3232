/**
 * Unit tests for doc_type smoothing (forward fill, novelty override, gap bridging)
 */

import { describe, it, expect } from 'vitest';
import {
  DEFAULT_GROUPING_CONFIG,
  resolveGroupingConfig,
  smoothDocTypes,
} from '../../../src/services/grouping/index.js';

const keys = (...k: string[]): Set<string> => new Set(k);

describe('smoothDocTypes', () => {
  describe('forward fill', () => {
    it('inherits the previous label when keys overlap', () => {
      const result = smoothDocTypes(
        ['passport', null],
        [keys('surname', 'date_of_birth'), keys('surname', 'issue_date')],
        DEFAULT_GROUPING_CONFIG
      );
      expect(result).toEqual(['passport', 'passport']);
    });

    it('does not fill without enough overlap', () => {
      const result = smoothDocTypes(
        ['passport', null],
        [keys('surname'), keys('signature')],
        DEFAULT_GROUPING_CONFIG
      );
      expect(result).toEqual(['passport', null]);
    });

    it('chains across consecutive unlabeled pages', () => {
      const result = smoothDocTypes(
        ['bank_statement', null, null],
        [keys('account_number', 'iban'), keys('account_number'), keys('account_number', 'balance')],
        DEFAULT_GROUPING_CONFIG
      );
      expect(result).toEqual(['bank_statement', 'bank_statement', 'bank_statement']);
    });

    it('never fills the first page', () => {
      const result = smoothDocTypes([null, 'passport'], [keys('a'), keys('a')], DEFAULT_GROUPING_CONFIG);
      expect(result).toEqual([null, 'passport']);
    });

    it('fills a page with no keys when the overlap threshold is 0', () => {
      const config = resolveGroupingConfig({ minKeyOverlapForContinuation: 0 });
      const result = smoothDocTypes(['id_card', null], [keys('surname'), keys()], config);
      expect(result).toEqual(['id_card', 'id_card']);
    });

    it('is skipped entirely when disabled', () => {
      const config = resolveGroupingConfig({ forwardFill: false, bridgeGap: false });
      const result = smoothDocTypes(['passport', null], [keys('surname'), keys('surname')], config);
      expect(result).toEqual(['passport', null]);
    });
  });

  describe('novelty override', () => {
    it('blocks forward fill at exactly minFieldsForNewDoc novel keys', () => {
      const result = smoothDocTypes(
        ['passport', null],
        [keys('surname'), keys('surname', 'license_number', 'license_class', 'vehicle_class')],
        DEFAULT_GROUPING_CONFIG
      );
      // overlap 1 satisfies continuation, but 3 novel keys win
      expect(result).toEqual(['passport', null]);
    });

    it('allows forward fill one key below the threshold', () => {
      const result = smoothDocTypes(
        ['passport', null],
        [keys('surname'), keys('surname', 'license_number', 'license_class')],
        DEFAULT_GROUPING_CONFIG
      );
      expect(result).toEqual(['passport', 'passport']);
    });
  });

  describe('gap bridging', () => {
    it('fills A, -, A regardless of keys', () => {
      const config = resolveGroupingConfig({ forwardFill: false });
      const result = smoothDocTypes(
        ['id_card', null, 'id_card'],
        [keys('surname'), keys('x1', 'x2', 'x3', 'x4'), keys('surname')],
        config
      );
      expect(result).toEqual(['id_card', 'id_card', 'id_card']);
    });

    it('does not bridge between different labels', () => {
      const result = smoothDocTypes(
        ['passport', null, 'utility_bill'],
        [keys('a'), keys('b'), keys('c')],
        DEFAULT_GROUPING_CONFIG
      );
      expect(result).toEqual(['passport', null, 'utility_bill']);
    });

    it('does not bridge a run of two unlabeled pages', () => {
      const result = smoothDocTypes(
        ['passport', null, null, 'passport'],
        [keys('a'), keys('b'), keys('c'), keys('a')],
        DEFAULT_GROUPING_CONFIG
      );
      expect(result).toEqual(['passport', null, null, 'passport']);
    });

    it('is skipped when disabled', () => {
      const config = resolveGroupingConfig({ forwardFill: false, bridgeGap: false });
      const result = smoothDocTypes(
        ['id_card', null, 'id_card'],
        [keys(), keys(), keys()],
        config
      );
      expect(result).toEqual(['id_card', null, 'id_card']);
    });
  });

  it('treats whitespace-only labels as missing', () => {
    const result = smoothDocTypes(['  ', ''], [keys(), keys()], DEFAULT_GROUPING_CONFIG);
    expect(result).toEqual([null, null]);
  });

  it('does not mutate its input', () => {
    const labels = ['passport', null];
    smoothDocTypes(labels, [keys('surname'), keys('surname')], DEFAULT_GROUPING_CONFIG);
    expect(labels).toEqual(['passport', null]);
  });

  it('rejects mismatched lengths', () => {
    expect(() => smoothDocTypes(['passport'], [], DEFAULT_GROUPING_CONFIG)).toThrow(RangeError);
  });
});
