/**
 * File Chunker
 *
 * File-level wrapper around the chunking engine:
 * 1. Check size limit and read the file
 * 2. Build the line-indexed document
 * 3. chunkDocument() with a logger that collects warnings
 * 4. Report success, skip reason or error per file
 *
 * Files are independent; nothing is shared between them.
 */

import { readFile, stat } from 'node:fs/promises';

import { createCollectingLogger } from '../utils/logger.js';
import { chunkDocument } from './assembler.js';
import { MAX_FILE_SIZE } from './config.js';
import { LineIndexedDocument } from './document.js';
import type { BatchChunkResult, ChunkDocumentOptions, FileChunkResult } from './types.js';

/**
 * Chunk a single file with structured result reporting.
 *
 * Read failures and oversized files come back as failed results;
 * invalid options still throw, since they affect every file alike.
 *
 * @param filePath - Path of the stylesheet
 * @param options - Chunking options; warnings are also forwarded to options.logger
 * @returns FileChunkResult with success, chunks, and error details
 */
export async function chunkFileWithResult(
  filePath: string,
  options: ChunkDocumentOptions = {}
): Promise<FileChunkResult> {
  const logger = createCollectingLogger(options.logger);

  let size: number;
  try {
    size = (await stat(filePath)).size;
  } catch (error) {
    return {
      filePath,
      success: false,
      chunks: [],
      skipReason: 'read_error',
      error: describeReadError(error, filePath),
      warnings: logger.warnings,
    };
  }

  if (size > MAX_FILE_SIZE) {
    return {
      filePath,
      success: false,
      chunks: [],
      skipReason: 'too_large',
      error: `File too large (${formatSize(size)} > ${formatSize(MAX_FILE_SIZE)})`,
      warnings: logger.warnings,
    };
  }

  let content: string;
  try {
    content = await readFile(filePath, 'utf-8');
  } catch (error) {
    return {
      filePath,
      success: false,
      chunks: [],
      skipReason: 'read_error',
      error: describeReadError(error, filePath),
      warnings: logger.warnings,
    };
  }

  // Empty files are success (valid file, just no content)
  if (!content.trim()) {
    return {
      filePath,
      success: true,
      chunks: [],
      skipReason: 'empty',
      warnings: logger.warnings,
    };
  }

  const document = new LineIndexedDocument(content, filePath);
  const chunks = chunkDocument(document, { ...options, logger });

  return {
    filePath,
    success: true,
    chunks,
    warnings: logger.warnings,
  };
}

/**
 * Chunk multiple files with aggregated result reporting.
 *
 * @param filePaths - Stylesheets to chunk, processed one after another
 * @param options - Chunking options shared by every file
 * @param onFile - Called after each file
 * @returns BatchChunkResult with aggregated statistics
 */
export async function chunkFilesWithResult(
  filePaths: string[],
  options: ChunkDocumentOptions = {},
  onFile?: (result: FileChunkResult) => void
): Promise<BatchChunkResult> {
  const fileResults: FileChunkResult[] = [];
  let successCount = 0;
  let failureCount = 0;
  const allWarnings: string[] = [];
  const allErrors: string[] = [];

  for (const filePath of filePaths) {
    const result = await chunkFileWithResult(filePath, options);
    fileResults.push(result);
    onFile?.(result);

    if (result.success) {
      successCount++;
    } else {
      failureCount++;
      if (result.error) {
        allErrors.push(`${result.filePath}: ${result.error}`);
      }
    }

    allWarnings.push(...result.warnings);
  }

  return {
    files: fileResults,
    successCount,
    failureCount,
    totalChunks: fileResults.reduce((sum, r) => sum + r.chunks.length, 0),
    warnings: allWarnings,
    errors: allErrors,
  };
}

function describeReadError(error: unknown, filePath: string): string {
  if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
    return `Path does not exist: ${filePath}`;
  }
  return error instanceof Error ? error.message : String(error);
}

/**
 * Format file size in human-readable form.
 */
export function formatSize(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
}
