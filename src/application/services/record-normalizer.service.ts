import { Injectable, Logger } from '@nestjs/common';
import { CollectionIdVO } from '../../domain/value-objects/collection-id.vo';
import { CorruptArchiveError } from '../../domain/errors/pipeline.errors';

export type RecordFormat = 'canonical' | 'legacy';

export type HeaderParseFailure = 'blank-header' | 'accession-not-found';

export type HeaderParseResult =
  | { ok: true; accession: string; description: string }
  | { ok: false; reason: HeaderParseFailure };

const RECORD_MARKER = '>';
const LINE_TERMINATOR = /\r?\n$/;

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Parser for legacy headers, where the accession and the description are
 * joined by a pipe, possibly after other pipe-delimited fields:
 *
 *   >gi|123|gb|ABCD01000001.1|Some description
 *
 * Built once per collection since the accession pattern embeds its id.
 */
export class HeaderParser {
  private readonly pattern: RegExp;

  constructor(readonly collectionId: CollectionIdVO) {
    this.pattern = new RegExp(`(${escapeRegExp(collectionId.value)}\\d{5,8}\\.\\d)\\|(.*)$`);
  }

  parse(line: string): HeaderParseResult {
    const header = line.replace(LINE_TERMINATOR, '');
    if (header.replace(RECORD_MARKER, '').trim().length === 0) {
      return { ok: false, reason: 'blank-header' };
    }

    const match = this.pattern.exec(header);
    if (!match) {
      return { ok: false, reason: 'accession-not-found' };
    }

    const [, accession, description] = match;
    return { ok: true, accession, description: description.trim() };
  }
}

/**
 * Record Normalizer Service
 * Rewrites the records of one decompressed archive into `>accession description` form
 */
@Injectable()
export class RecordNormalizerService {
  private readonly logger = new Logger(RecordNormalizerService.name);

  createHeaderParser(collectionId: CollectionIdVO): HeaderParser {
    return new HeaderParser(collectionId);
  }

  /**
   * Canonical files carry the collection id right after the record marker.
   * The window is widened for ids longer than six characters.
   */
  detectFormat(firstLine: string, collectionId: CollectionIdVO): RecordFormat {
    const window = Math.max(7, collectionId.value.length + 1);
    return firstLine.slice(0, window).includes(collectionId.value) ? 'canonical' : 'legacy';
  }

  /**
   * Lines must keep their terminators; canonical content is yielded
   * byte-identically. The first line is always treated as a header.
   */
  async *normalize(
    lines: AsyncIterable<string> | Iterable<string>,
    parser: HeaderParser,
    fileName: string,
  ): AsyncGenerator<string> {
    let lineNumber = 0;
    let format: RecordFormat | undefined;

    for await (const line of lines) {
      lineNumber++;

      if (format === undefined) {
        format = this.detectFormat(line, parser.collectionId);
        this.logger.debug(`${fileName} uses the ${format} header format`);
        yield format === 'canonical' ? line : this.rewriteHeader(parser, line, fileName, lineNumber);
        continue;
      }

      if (format === 'canonical' || !line.startsWith(RECORD_MARKER)) {
        yield line;
        continue;
      }

      yield this.rewriteHeader(parser, line, fileName, lineNumber);
    }

    if (lineNumber === 0) {
      throw new CorruptArchiveError('Unexpected end of file: archive has no records', fileName);
    }
  }

  private rewriteHeader(parser: HeaderParser, line: string, fileName: string, lineNumber: number): string {
    const result = parser.parse(line);
    if (!result.ok) {
      throw new CorruptArchiveError(`Malformed header (${result.reason})`, fileName, lineNumber);
    }
    return `${RECORD_MARKER}${result.accession} ${result.description}\n`;
  }
}
