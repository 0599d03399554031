#!/usr/bin/env node
/**
 * Main entry point for the document QA CLI
 */

import 'dotenv/config';
import * as fs from 'fs';
import * as path from 'path';
import { loadConfig } from './config';
import { createRuntime } from './bootstrap';
import { HttpPdfExtractor } from './pdfExtractor';
import { describeError } from './errors';
import { AskOptions } from './pipeline';
import { logger } from './logger';

type Command = 'ingest' | 'ask' | 'remove' | 'list';

interface CliArgs {
  command: Command;
  target?: string;
  documentId?: string;
  outputPath?: string;
  ask: AskOptions;
}

const USAGE = `
Grounded document QA

Usage:
  npm start -- <command> [arguments] [options]

Commands:
  ingest <pdf-file-path>    Extract, chunk, embed and index a PDF
  ask <question>            Answer a question from the indexed documents
  remove <document-id>      Remove a document from the index
  list                      List indexed documents

Options:
  --id <document-id>        Document id for ingest (default: derived from the file name)
  --k <n>                   Number of chunks to retrieve
  --min-score <x>           Minimum similarity score
  --budget <n>              Context budget in characters
  --output <path>           Write the answer as JSON to a file
  --help, -h                Show this help message

Environment Variables:
  GROQ_API_KEY              Groq API key (required for ask)
  EMBEDDING_API_URL         OpenAI-compatible embeddings endpoint base URL
  EMBEDDING_API_KEY         Embeddings API key (falls back to OPENAI_API_KEY)
  EXTRACTION_API_URL        PDF page extraction service URL
  RAG_INDEX_PATH            Index file (default: ./storage/vector-index.json)

Examples:
  npm start -- ingest policy.pdf
  npm start -- ask "How many days of annual leave do employees get?" --k 5
`;

function parseNumberOption(name: string, value: string | undefined): number {
  const parsed = Number(value);
  if (value === undefined || !Number.isFinite(parsed)) {
    console.error(`Error: ${name} expects a number`);
    process.exit(1);
  }
  return parsed;
}

/**
 * Parse command line arguments
 */
function parseArgs(): CliArgs {
  const args = process.argv.slice(2);

  if (args.length === 0 || args.includes('--help') || args.includes('-h')) {
    console.log(USAGE);
    process.exit(0);
  }

  const [command, ...rest] = args;
  if (command !== 'ingest' && command !== 'ask' && command !== 'remove' && command !== 'list') {
    console.error(`Error: unknown command "${command}"`);
    console.log(USAGE);
    process.exit(1);
  }

  const parsed: CliArgs = { command, ask: {} };
  let i = 0;

  if (command !== 'list') {
    parsed.target = rest[0];
    i = 1;
    if (!parsed.target) {
      console.error(`Error: ${command} needs an argument`);
      process.exit(1);
    }
  }

  for (; i < rest.length; i += 2) {
    const key = rest[i];
    const value = rest[i + 1];

    switch (key) {
      case '--id':
        parsed.documentId = value;
        break;
      case '--k':
        parsed.ask.k = parseNumberOption(key, value);
        break;
      case '--min-score':
        parsed.ask.minScore = parseNumberOption(key, value);
        break;
      case '--budget':
        parsed.ask.contextBudget = parseNumberOption(key, value);
        break;
      case '--output':
        parsed.outputPath = value;
        break;
      default:
        console.error(`Error: unknown option "${key}"`);
        process.exit(1);
    }
  }

  return parsed;
}

/**
 * Main function
 */
async function main(): Promise<void> {
  const args = parseArgs();
  const config = loadConfig();
  const runtime = await createRuntime(config);

  // Ctrl+C aborts an in-flight question before generation
  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());

  try {
    switch (args.command) {
      case 'ingest': {
        const extractor = new HttpPdfExtractor(config.extraction.apiUrl, config.extraction.timeoutMs);
        const document = await extractor.extract(args.target ?? '', args.documentId);
        const result = await runtime.qa.ingest(document, { signal: controller.signal });
        console.log(`\nDocument: ${document.id}`);
        console.log(`Chunks created: ${result.chunksCreated}${result.skipped ? ' (unchanged, skipped)' : ''}`);
        break;
      }
      case 'ask': {
        const result = await runtime.qa.ask(args.target ?? '', { ...args.ask, signal: controller.signal });

        logger.separator('=');
        console.log('\nQuestion:', args.target);
        console.log('\nAnswer:');
        console.log(result.answer);
        if (!result.refused) {
          console.log(`\nConfidence: ${result.confidence.toFixed(2)}`);
          console.log('Citations:');
          result.citations.forEach(c => console.log(`  - ${c.document}, page ${c.page} (${c.chunkId})`));
        }
        logger.separator('=');

        if (args.outputPath) {
          const outputDir = path.dirname(args.outputPath);
          if (!fs.existsSync(outputDir)) {
            fs.mkdirSync(outputDir, { recursive: true });
          }
          fs.writeFileSync(args.outputPath, JSON.stringify({ question: args.target, ...result }, null, 2), 'utf-8');
          logger.success(`Results saved to: ${args.outputPath}`);
        }
        break;
      }
      case 'remove': {
        const removed = runtime.qa.removeDocument(args.target ?? '');
        console.log(`Removed ${removed} chunks`);
        break;
      }
      case 'list': {
        const documents = runtime.qa.listDocuments();
        if (documents.length === 0) {
          console.log('No documents indexed');
        }
        documents.forEach(d => console.log(`${d.documentId}\t${d.source}\t${d.chunkCount} chunks`));
        break;
      }
    }
  } finally {
    await runtime.close();
  }
}

main().catch(error => {
  logger.error('Command failed', error);
  console.error(`Error: ${describeError(error)}`);
  process.exit(1);
});
