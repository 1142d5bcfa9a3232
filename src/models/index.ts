/**
 * KYC Multi-Document Extraction - Data Models
 *
 * Barrel export for all model interfaces.
 */

export * from './extraction.js';
