/**
 * Page image resolution for multi-document extraction
 *
 * Turns an explicit list of image paths, or a directory of page images, into
 * the ordered list of files to extract. Page order is list order for explicit
 * paths and natural filename order (page2 before page10) for directories.
 *
 * PDFs are not rasterized here; callers pass one image per page.
 *
 * @module services/extraction/page-loader
 */

import { existsSync, lstatSync, readdirSync, statSync } from 'fs';
import { basename, extname, resolve } from 'path';

import { pathNotDirectoryError, pathNotFoundError } from '../../server/errors.js';
import { sanitizePath, ValidationError } from '../../utils/validation.js';
import { UnsupportedFileTypeError } from '../vision/errors.js';

export const PAGE_IMAGE_EXTENSIONS = ['png', 'jpg', 'jpeg', 'webp', 'gif'] as const;

export type PageSource = { filePaths: string[] } | { directory: string };

export interface ResolvedPages {
  /** Absolute paths in page order, at most maxPages long */
  paths: string[];
  /** Pages found before truncation */
  totalFound: number;
  truncated: boolean;
}

const naturalCompare = (a: string, b: string): number =>
  a.localeCompare(b, undefined, { numeric: true, sensitivity: 'base' });

function extensionOf(filePath: string): string {
  return extname(filePath).slice(1).toLowerCase();
}

function isPageImage(filePath: string): boolean {
  const ext = extensionOf(filePath);
  return PAGE_IMAGE_EXTENSIONS.some((allowed) => allowed === ext);
}

function rejectPdf(filePath: string): void {
  if (extensionOf(filePath) === 'pdf') {
    throw new UnsupportedFileTypeError(
      `PDF input is not supported: ${basename(filePath)}. Rasterize it to one image per page and pass the images instead.`,
      filePath
    );
  }
}

function resolveExplicitPaths(filePaths: string[], allowedBaseDirs?: string[]): string[] {
  return filePaths.map((filePath) => {
    const safePath = sanitizePath(filePath, allowedBaseDirs);
    if (!existsSync(safePath)) {
      throw pathNotFoundError(safePath);
    }
    rejectPdf(safePath);
    if (!isPageImage(safePath)) {
      throw new UnsupportedFileTypeError(
        `Unsupported page image format '${extensionOf(safePath)}' (file: ${basename(safePath)}). Accepted: ${PAGE_IMAGE_EXTENSIONS.join(', ')}`,
        safePath
      );
    }
    return safePath;
  });
}

function listDirectoryPages(directory: string, allowedBaseDirs?: string[]): string[] {
  const safeDirPath = sanitizePath(directory, allowedBaseDirs);
  if (!existsSync(safeDirPath)) {
    throw pathNotFoundError(safeDirPath);
  }
  if (!statSync(safeDirPath).isDirectory()) {
    throw pathNotDirectoryError(safeDirPath);
  }

  const pages: string[] = [];
  for (const entry of readdirSync(safeDirPath, { withFileTypes: true })) {
    const fullPath = resolve(safeDirPath, entry.name);
    if (lstatSync(fullPath).isSymbolicLink()) {
      console.error(`[WARN] Skipping symlink in page directory: ${fullPath}`);
      continue;
    }
    if (!entry.isFile()) continue;

    rejectPdf(fullPath);
    if (isPageImage(fullPath)) {
      pages.push(fullPath);
    } else {
      console.error(`[WARN] Skipping non-image file in page directory: ${entry.name}`);
    }
  }

  return pages.sort((a, b) => naturalCompare(basename(a), basename(b)));
}

/**
 * Resolve the page images to extract, in page order.
 *
 * @throws ValidationError when both or neither source is given, or no page image is found
 * @throws MCPError PATH_NOT_FOUND / PATH_NOT_DIRECTORY
 * @throws UnsupportedFileTypeError for PDFs and non-image files passed explicitly
 */
export function resolvePageFiles(
  source: PageSource,
  maxPages: number,
  allowedBaseDirs?: string[]
): ResolvedPages {
  const hasPaths = 'filePaths' in source;
  const hasDirectory = 'directory' in source;
  if (hasPaths === hasDirectory) {
    throw new ValidationError('Provide exactly one of file_paths or directory');
  }

  const found =
    'filePaths' in source
      ? resolveExplicitPaths(source.filePaths, allowedBaseDirs)
      : listDirectoryPages(source.directory, allowedBaseDirs);

  if (found.length === 0) {
    throw new ValidationError(
      `No page images found. Accepted formats: ${PAGE_IMAGE_EXTENSIONS.join(', ')}`
    );
  }

  const truncated = found.length > maxPages;
  if (truncated) {
    console.error(
      `[WARN] ${found.length} pages found, only the first ${maxPages} are processed (MULTI_MAX_PAGES)`
    );
  }

  return {
    paths: truncated ? found.slice(0, maxPages) : found,
    totalFound: found.length,
    truncated,
  };
}
