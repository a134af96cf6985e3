/**
 * Public entry point: a Drive share link used as a data source.
 *
 * @example
 * const source = new ShareLinkSource('https://drive.google.com/file/d/FILE_ID/view');
 * if (await source.isAccessible()) {
 *   const result = await source.start('rows');
 *   if (result.shape === 'rows') console.log(result.rows);
 * }
 */

import { buildDownloadUrl, extractResourceId, isValidShareLink, parseShareLink } from '../utils/url';
import { debugLog } from './config';
import { FormatError, ParseError, formatErrorForLog, toShareLinkError } from './errors';
import { parseDelimitedText } from './parser';
import { fetchAndStage, isAccessible, withStagedResource } from './resource-fetcher';
import { mapRows } from './row-mapper';
import { createTempDirStore, type StagingStore } from './staging';
import { createFetchTransport, type HttpTransport } from './transport';
import type { DataRecord, ModelSpec, ParseResult, ResultShape, Row } from './types';

/**
 * Collaborators a source uses for I/O.
 */
export interface ShareLinkSourceOptions {
  /** HTTP client; defaults to the global fetch */
  transport?: HttpTransport;
  /** Temporary storage; defaults to files in the staging directory */
  store?: StagingStore;
}

type StartWithModelArgs<T> =
  | [fromRow: (row: Row) => T, useHeader?: false]
  | [fromRecord: (record: DataRecord) => T, useHeader: true];

function isRecordModelCall<T>(
  args: StartWithModelArgs<T>
): args is [fromRecord: (record: DataRecord) => T, useHeader: true] {
  return args[1] === true;
}

export class ShareLinkSource {
  /** The link as given */
  readonly rawLink: string;
  /** File ID extracted from the link */
  readonly resourceId: string;
  /** Direct download URL for the file */
  readonly downloadUrl: string;

  private readonly transport: HttpTransport;
  private readonly store: StagingStore;

  /**
   * @throws FormatError when the link is not a Drive file share link
   */
  constructor(rawLink: string, options: ShareLinkSourceOptions = {}) {
    if (!isValidShareLink(rawLink)) {
      throw new FormatError(parseShareLink(rawLink).errorMessage);
    }

    this.rawLink = rawLink;
    this.resourceId = extractResourceId(rawLink);
    this.downloadUrl = buildDownloadUrl(this.resourceId);
    this.transport = options.transport ?? createFetchTransport();
    this.store = options.store ?? createTempDirStore();
  }

  /**
   * Probe the file with a HEAD request.
   * Resolves `true` for status 200 and `false` otherwise; never rejects.
   */
  async isAccessible(): Promise<boolean> {
    return await isAccessible(this.downloadUrl, this.transport);
  }

  /**
   * Download the file and parse it into the requested shape.
   *
   * With `none` the file is downloaded and discarded. The staged copy is
   * removed before this resolves or rejects.
   *
   * @param shape - `rows`, `records` (needs `useHeader`), or `none`
   * @param useHeader - Key records by the first non-empty line
   * @throws TransportError when the download status is not 200
   * @throws ParseError when the content cannot be decoded
   */
  async start(shape: ResultShape = 'none', useHeader: boolean = false): Promise<ParseResult> {
    try {
      const resource = await fetchAndStage(this.downloadUrl, this.resourceId, {
        transport: this.transport,
        store: this.store,
      });

      return await withStagedResource(resource, async (staged): Promise<ParseResult> => {
        if (shape !== 'rows' && shape !== 'records') {
          debugLog('Source', `No result shape requested for ${this.resourceId}, download only`);
          return { shape: 'none' };
        }

        let text: string;
        try {
          text = await staged.readText();
        } catch (error) {
          throw new ParseError(error);
        }

        const result = parseDelimitedText(text, shape, useHeader);
        if (result.shape === 'none') {
          console.warn(`[Source] Records need the header flag; nothing parsed for ${this.resourceId}`);
        }
        return result;
      });
    } catch (error) {
      const shareError = toShareLinkError(error);
      console.warn(`[Source] Could not start ${this.resourceId}: ${shareError.message}`);
      debugLog('Source', formatErrorForLog(shareError));
      throw error;
    }
  }

  /**
   * Download, parse, and build one model per entry.
   *
   * Without `useHeader` the transform receives each row; with it, each
   * record keyed by the first non-empty line.
   *
   * @example
   * const works = await source.startWithModel((row) => ({
   *   images: cellAsList(row[0]),
   *   title: cellAsText(row[1]),
   * }));
   * const parts = await source.startWithModel((record) => cellAsText(record.name), true);
   */
  startWithModel<T>(fromRow: (row: Row) => T, useHeader?: false): Promise<T[]>;
  startWithModel<T>(fromRecord: (record: DataRecord) => T, useHeader: true): Promise<T[]>;
  async startWithModel<T>(...args: StartWithModelArgs<T>): Promise<T[]> {
    if (isRecordModelCall(args)) {
      return await this.startWith({ shape: 'records', fromRecord: args[0] });
    }
    return await this.startWith({ shape: 'rows', fromRow: args[0] });
  }

  /**
   * Download, parse with the first line as header, and build one model per record.
   */
  async startWithRecordModel<T>(fromRecord: (record: DataRecord) => T): Promise<T[]> {
    return await this.startWith({ shape: 'records', fromRecord });
  }

  /**
   * Download, parse in the model's shape, and map every entry.
   * Errors thrown by the model transform propagate unwrapped.
   */
  async startWith<T>(model: ModelSpec<T>): Promise<T[]> {
    const useHeader = model.shape === 'records';
    const result = await this.start(model.shape, useHeader);
    return mapRows(result, model);
  }
}
