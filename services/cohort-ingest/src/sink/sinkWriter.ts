import { promises as fs } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { ParquetSchema, ParquetWriter } from 'parquetjs-lite';
import type { ParquetRow, ParquetSchemaDefinition } from 'parquetjs-lite';
import type { Logger } from '@cohortforge/shared';
import { OUTPUT_FORMATS } from '../config/serviceConfig';
import type { OutputFormat } from '../config/serviceConfig';
import { IngestError, assertUnreachable } from '../errors';
import type { ObjectStore } from '../store/types';
import { formatDelimited } from '../table/delimited';
import type { AssembledDataset } from '../types';

export type Destination =
  | { kind: 's3'; bucket: string; key: string }
  | { kind: 'file'; path: string };

export type WriteResult = {
  destination: Destination;
  format: OutputFormat;
  bytes: number;
  contentType: string;
};

export type SinkWriterOptions = {
  /** Object store for an `s3://` bucket. */
  resolveBucket: (bucket: string) => ObjectStore;
  logger: Logger;
};

export function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some((format) => format === value);
}

export function parseDestination(destination: string): Destination {
  const trimmed = destination.trim();
  if (trimmed.length === 0) {
    throw new IngestError('Destination must not be empty', 'INVALID_DESTINATION');
  }
  const s3Match = /^s3:\/\/([^/]+)\/(.+)$/.exec(trimmed);
  if (s3Match) {
    return { kind: 's3', bucket: s3Match[1], key: s3Match[2] };
  }
  if (trimmed.startsWith('s3://')) {
    throw new IngestError(`Destination needs both bucket and key: ${trimmed}`, 'INVALID_DESTINATION');
  }
  if (trimmed.startsWith('file://')) {
    return { kind: 'file', path: fileURLToPath(trimmed) };
  }
  if (/^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed)) {
    throw new IngestError(`Unsupported destination scheme: ${trimmed}`, 'INVALID_DESTINATION');
  }
  return { kind: 'file', path: path.resolve(trimmed) };
}

function destinationName(destination: Destination): string {
  return destination.kind === 's3' ? destination.key : destination.path;
}

export function serializeTabular(dataset: AssembledDataset, delimiter: ',' | '\t' = ','): Buffer {
  return Buffer.from(formatDelimited(dataset.columns.map((column) => column.name), dataset.rows, delimiter));
}

export async function serializeColumnar(dataset: AssembledDataset): Promise<Buffer> {
  const definition: ParquetSchemaDefinition = {};
  for (const column of dataset.columns) {
    definition[column.name] = { type: column.type === 'double' ? 'DOUBLE' : 'UTF8', optional: true };
  }
  const schema = new ParquetSchema(definition);
  const stagingDir = await fs.mkdtemp(path.join(tmpdir(), 'cohort-ingest-'));
  const stagingPath = path.join(stagingDir, 'dataset.parquet');
  try {
    const writer = await ParquetWriter.openFile(schema, stagingPath);
    try {
      for (const values of dataset.rows) {
        const row: ParquetRow = {};
        dataset.columns.forEach((column, index) => {
          const value = values[index];
          if (value === null || value === undefined) {
            return;
          }
          if (column.type === 'double') {
            if (typeof value === 'number') {
              row[column.name] = value;
            }
            return;
          }
          row[column.name] = String(value);
        });
        await writer.appendRow(row);
      }
    } finally {
      await writer.close();
    }
    return await fs.readFile(stagingPath);
  } finally {
    await fs.rm(stagingDir, { recursive: true, force: true });
  }
}

async function writeLocalFile(filePath: string, body: Buffer): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const staging = `${filePath}.${process.pid}.${Date.now()}.tmp`;
  try {
    await fs.writeFile(staging, body);
    await fs.rename(staging, filePath);
  } catch (error) {
    await fs.rm(staging, { force: true });
    throw error;
  }
}

export class SinkWriter {
  private readonly resolveBucket: (bucket: string) => ObjectStore;
  private readonly logger: Logger;

  constructor(options: SinkWriterOptions) {
    this.resolveBucket = options.resolveBucket;
    this.logger = options.logger;
  }

  /**
   * Serialises the dataset in memory and writes it with a single put. The
   * dataset is left untouched so a failed write can be retried.
   */
  async write(dataset: AssembledDataset, destination: string, format: string): Promise<WriteResult> {
    if (!isOutputFormat(format)) {
      throw new IngestError(`Unsupported output format: ${format}`, 'UNSUPPORTED_FORMAT', { details: { format } });
    }
    const target = parseDestination(destination);

    let body: Buffer;
    let contentType: string;
    switch (format) {
      case 'tabular-text': {
        const tsv = destinationName(target).toLowerCase().endsWith('.tsv');
        body = serializeTabular(dataset, tsv ? '\t' : ',');
        contentType = tsv ? 'text/tab-separated-values' : 'text/csv';
        break;
      }
      case 'columnar-binary':
        body = await serializeColumnar(dataset);
        contentType = 'application/vnd.apache.parquet';
        break;
      default:
        return assertUnreachable(format);
    }

    if (target.kind === 's3') {
      await this.resolveBucket(target.bucket).put(target.key, body, { contentType });
    } else {
      await writeLocalFile(target.path, body);
    }

    this.logger.info(
      { destination: destinationName(target), format, bytes: body.length, rows: dataset.rows.length },
      'Wrote dataset'
    );
    return { destination: target, format, bytes: body.length, contentType };
  }
}
