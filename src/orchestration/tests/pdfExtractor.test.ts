/**
 * Unit tests for the PDF extraction client
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import axios, { AxiosError } from 'axios';
import FormData from 'form-data';
import { HttpPdfExtractor, documentIdFromFileName } from '../src/pdfExtractor';
import { ConfigError, ExtractionServiceError, TimeoutError } from '../src/errors';

jest.mock('axios', () => {
  const actual = jest.requireActual('axios');
  return {
    __esModule: true,
    AxiosError: actual.AxiosError,
    default: {
      post: jest.fn(),
      isAxiosError: actual.isAxiosError,
      isCancel: actual.isCancel
    }
  };
});

const mockPost = axios.post as jest.Mock;

describe('PDF Extractor Module', () => {
  let directory: string;
  let pdfPath: string;
  const extractor = new HttpPdfExtractor('http://extract.test/', 5000);

  beforeEach(async () => {
    mockPost.mockReset();
    directory = await fs.mkdtemp(path.join(os.tmpdir(), 'pdf-extractor-'));
    pdfPath = path.join(directory, 'handbook.pdf');
    await fs.writeFile(pdfPath, '%PDF-1.4 placeholder');
  });

  afterEach(async () => {
    await fs.rm(directory, { recursive: true, force: true });
  });

  it('should upload the file and return pages in order', async () => {
    mockPost.mockResolvedValue({
      data: {
        filename: 'handbook.pdf',
        pages: [
          { page_number: 2, text: 'Second page' },
          { page_number: 1, text: 'First page' }
        ]
      }
    });

    const document = await extractor.extract(pdfPath);

    expect(document).toEqual({
      id: 'handbook.pdf',
      source: 'handbook.pdf',
      pages: [
        { pageNumber: 1, text: 'First page' },
        { pageNumber: 2, text: 'Second page' }
      ]
    });
    expect(mockPost).toHaveBeenCalledWith(
      'http://extract.test/extract-pages/',
      expect.any(FormData),
      expect.objectContaining({ timeout: 5000 })
    );
  });

  it('should use an explicit document id', async () => {
    mockPost.mockResolvedValue({ data: { filename: 'handbook.pdf', pages: [{ page_number: 1, text: 'Text' }] } });

    const document = await extractor.extract(pdfPath, 'hr-handbook');

    expect(document.id).toBe('hr-handbook');
  });

  it('should reject files that are not PDFs or do not exist', async () => {
    await expect(extractor.extract(path.join(directory, 'notes.txt'))).rejects.toThrow(ConfigError);
    await expect(extractor.extract(path.join(directory, 'missing.pdf'))).rejects.toThrow('file not found');
    expect(mockPost).not.toHaveBeenCalled();
  });

  it('should reject an unexpected response body', async () => {
    mockPost.mockResolvedValue({ data: { status: 'success', content: '# Markdown' } });

    await expect(extractor.extract(pdfPath)).rejects.toThrow(ExtractionServiceError);
  });

  it('should map a request timeout to TimeoutError', async () => {
    mockPost.mockRejectedValue(new AxiosError('timeout of 5000ms exceeded', 'ECONNABORTED'));

    await expect(extractor.extract(pdfPath)).rejects.toThrow(TimeoutError);
  });

  it('should map HTTP errors to ExtractionServiceError', async () => {
    const httpError = Object.assign(new AxiosError('Request failed with status code 500', 'ERR_BAD_RESPONSE'), {
      response: { status: 500, data: { detail: 'conversion failed' } }
    });
    mockPost.mockRejectedValue(httpError);

    const error = await extractor.extract(pdfPath).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ExtractionServiceError);
    expect(error).toMatchObject({ status: 500 });
  });

  describe('documentIdFromFileName', () => {
    it('should replace characters outside the id alphabet', () => {
      expect(documentIdFromFileName('Annual Report (2024).pdf')).toBe('Annual_Report_2024_.pdf');
      expect(documentIdFromFileName('###')).toBe('document');
    });
  });
});
