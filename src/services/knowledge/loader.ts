import fs from 'fs-extra';
import path from 'path';
import { RecursiveCharacterTextSplitter } from '@langchain/textsplitters';
import { KnowledgeSource, Segment, SourceKind } from './types';
import { LoadError, errorMessage } from '../../errors';
import logger from '../../utils/logger';

const log = logger.child({ module: 'Knowledge:Loader' });

const EXTENSION_KINDS: Record<string, SourceKind> = {
  '.pdf': 'pdf',
  '.txt': 'text',
  '.text': 'text',
  '.md': 'text',
  '.markdown': 'text',
};

export const SUPPORTED_EXTENSIONS = Object.keys(EXTENSION_KINDS);

const SNIFF_BYTES = 8192;

export interface SplitOptions {
  chunkSize: number;
  chunkOverlap: number;
}

async function readHead(filePath: string): Promise<Buffer> {
  const fd = await fs.open(filePath, 'r');
  try {
    const { bytesRead, buffer } = await fs.read(fd, Buffer.alloc(SNIFF_BYTES), 0, SNIFF_BYTES, 0);
    return buffer.subarray(0, bytesRead);
  } finally {
    await fs.close(fd);
  }
}

/**
 * Classifies a file as a knowledge source. The extension decides when there
 * is one; extensionless files are classified by their first bytes.
 */
export async function resolveKnowledgeSource(filePath: string): Promise<KnowledgeSource> {
  let stat: fs.Stats;
  try {
    stat = await fs.stat(filePath);
  } catch (err) {
    throw new LoadError(`File not found: ${filePath}`, filePath, { cause: err });
  }
  if (!stat.isFile()) {
    throw new LoadError(`Not a regular file: ${filePath}`, filePath);
  }

  const ext = path.extname(filePath).toLowerCase();
  if (ext) {
    const kind = EXTENSION_KINDS[ext];
    if (!kind) {
      throw new LoadError(
        `Unsupported file format "${ext}". Use one of: ${SUPPORTED_EXTENSIONS.join(', ')}`,
        filePath
      );
    }
    return { kind, path: filePath };
  }

  let head: Buffer;
  try {
    head = await readHead(filePath);
  } catch (err) {
    throw new LoadError(`Cannot read ${filePath}: ${errorMessage(err)}`, filePath, { cause: err });
  }
  if (head.subarray(0, 5).toString('latin1') === '%PDF-') {
    return { kind: 'pdf', path: filePath };
  }
  if (!head.includes(0)) {
    return { kind: 'text', path: filePath };
  }
  throw new LoadError(`Unsupported binary file: ${filePath}`, filePath);
}

async function extractPdf(filePath: string): Promise<string> {
  let buffer: Buffer;
  try {
    buffer = await fs.readFile(filePath);
  } catch (err) {
    throw new LoadError(`Cannot read ${filePath}: ${errorMessage(err)}`, filePath, { cause: err });
  }

  try {
    // Loaded on demand to keep the parser out of startup
    const pdfParse = (await import('pdf-parse')).default;
    const data = await pdfParse(buffer);
    return data.text;
  } catch (err) {
    throw new LoadError(`PDF extraction failed for ${filePath}: ${errorMessage(err)}`, filePath, { cause: err });
  }
}

async function extractText(filePath: string): Promise<string> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    throw new LoadError(`Cannot read ${filePath}: ${errorMessage(err)}`, filePath, { cause: err });
  }
  if (text.includes('\u0000')) {
    throw new LoadError(`${filePath} contains binary data`, filePath);
  }
  return text;
}

export async function extractSourceText(source: KnowledgeSource): Promise<string> {
  switch (source.kind) {
    case 'pdf':
      return extractPdf(source.path);
    case 'text':
      return extractText(source.path);
  }
}

/**
 * Splits text into overlapping chunks and records where each chunk starts in
 * the original text.
 */
export async function splitIntoSegments(text: string, source: string, options: SplitOptions): Promise<Segment[]> {
  if (text.trim().length === 0) return [];

  const splitter = new RecursiveCharacterTextSplitter({
    chunkSize: options.chunkSize,
    chunkOverlap: options.chunkOverlap,
  });
  const chunks = await splitter.splitText(text);

  const segments: Segment[] = [];
  let cursor = 0;
  for (const chunk of chunks) {
    let offset = text.indexOf(chunk, cursor);
    if (offset === -1) offset = text.indexOf(chunk);
    if (offset === -1) offset = cursor;
    segments.push({ text: chunk, offset, source });
    cursor = offset + 1;
  }
  return segments;
}

export async function loadSegments(source: KnowledgeSource, options: SplitOptions): Promise<Segment[]> {
  const text = await extractSourceText(source);
  const segments = await splitIntoSegments(text, path.basename(source.path), options);
  log.info(`Loaded ${segments.length} segments from ${source.path} (${source.kind})`);
  return segments;
}
