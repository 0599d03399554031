/**
 * PDF text extraction client
 * Uploads a PDF to the extraction service and turns its page texts into a Document
 */

import * as fs from 'fs';
import * as path from 'path';
import FormData from 'form-data';
import axios from 'axios';
import { Document, Page } from './types';
import { ConfigError, ExtractionServiceError, RagError, TimeoutError } from './errors';
import { logger } from './logger';

export interface PdfTextExtractor {
  extract(filePath: string, documentId?: string): Promise<Document>;
}

interface ExtractionResponse {
  filename: string;
  pages: Array<{ page_number: number; text: string }>;
}

function isExtractionResponse(value: unknown): value is ExtractionResponse {
  if (typeof value !== 'object' || value === null || !('pages' in value) || !('filename' in value)) {
    return false;
  }

  const { pages, filename } = value;
  return typeof filename === 'string' && Array.isArray(pages) && pages.every(page =>
    typeof page === 'object' &&
    page !== null &&
    typeof page.page_number === 'number' &&
    typeof page.text === 'string'
  );
}

/**
 * Document id derived from a file name: letters, digits, ".", "_" and "-" only
 */
export function documentIdFromFileName(fileName: string): string {
  const id = fileName.trim().replace(/[^A-Za-z0-9._-]+/g, '_').replace(/^_+|_+$/g, '');
  return id || 'document';
}

export class HttpPdfExtractor implements PdfTextExtractor {
  constructor(
    private readonly apiUrl: string,
    private readonly timeoutMs: number
  ) {}

  async extract(filePath: string, documentId?: string): Promise<Document> {
    logger.section('PDF Extraction');
    logger.info(`File: ${path.basename(filePath)}`);
    logger.info(`API URL: ${this.apiUrl}`);

    if (!filePath.toLowerCase().endsWith('.pdf')) {
      throw new ConfigError('filePath', `file must be a PDF: ${filePath}`);
    }
    if (!fs.existsSync(filePath)) {
      throw new ConfigError('filePath', `file not found: ${filePath}`);
    }

    try {
      const form = new FormData();
      form.append('file', fs.createReadStream(filePath));

      logger.info('Uploading PDF for page extraction...');
      const response = await axios.post<unknown>(
        `${this.apiUrl.replace(/\/+$/, '')}/extract-pages/`,
        form,
        {
          headers: {
            ...form.getHeaders()
          },
          timeout: this.timeoutMs,
          maxContentLength: Infinity,
          maxBodyLength: Infinity
        }
      );

      if (!isExtractionResponse(response.data)) {
        throw new ExtractionServiceError('Invalid extraction response shape');
      }

      const pages: Page[] = response.data.pages
        .map(page => ({ pageNumber: page.page_number, text: page.text }))
        .sort((a, b) => a.pageNumber - b.pageNumber);

      const source = response.data.filename || path.basename(filePath);
      logger.success(`Extracted ${pages.length} pages from ${source}`);

      return {
        id: documentId ?? documentIdFromFileName(source),
        source,
        pages
      };
    } catch (error) {
      if (error instanceof RagError) {
        throw error;
      }
      if (axios.isAxiosError(error)) {
        if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
          throw new TimeoutError('PDF extraction', this.timeoutMs);
        }
        logger.error('Extraction API error:', error.response?.data ?? error.message);
        throw new ExtractionServiceError(`PDF extraction failed: ${error.message}`, error.response?.status, error);
      }

      const message = error instanceof Error ? error.message : String(error);
      throw new ExtractionServiceError(`PDF extraction failed: ${message}`, undefined, error);
    }
  }
}
