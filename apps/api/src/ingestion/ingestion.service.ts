import { Injectable, Logger } from '@nestjs/common';
import { readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import {
  AUDIO_FEATURE_COLUMNS,
  AudioFeatureColumn,
  ColumnValue,
  ColumnarSongExport,
  ColumnarSongExportSchema,
  IngestionResult,
  NormalizedSongRecord,
  SongIdSchema,
} from '@playlist-api/shared';
import { DatabaseService } from '../config/database.service';
import { ValidationError } from '../common/errors';
import { parseInput } from '../common/validation';

export const SCHEMA_PATH = join(__dirname, '..', '..', 'sql', 'schema.sql');

const INTEGER_COLUMNS: ReadonlySet<AudioFeatureColumn> = new Set<AudioFeatureColumn>([
  'key',
  'mode',
  'duration_ms',
  'time_signature',
  'num_bars',
  'num_sections',
  'num_segments',
  'class',
]);

const UPSERT_COLUMNS = ['id', 'title', ...AUDIO_FEATURE_COLUMNS] as const;

// current_rating and the rating log are left alone on conflict
const UPSERT_SQL = `INSERT INTO songs (${UPSERT_COLUMNS.map((c) => `"${c}"`).join(', ')})
VALUES (${UPSERT_COLUMNS.map((_, i) => `$${i + 1}`).join(', ')})
ON CONFLICT (id) DO UPDATE SET ${UPSERT_COLUMNS.slice(1)
  .map((c) => `"${c}" = EXCLUDED."${c}"`)
  .join(', ')}`;

export interface IngestOptions {
  exportPath?: string;
}

export interface IngestSummary extends IngestionResult {
  records: number;
}

function compareRowIndex(a: string, b: string): number {
  const left = Number(a);
  const right = Number(b);
  if (Number.isFinite(left) && Number.isFinite(right) && left !== right) {
    return left - right;
  }
  return a.localeCompare(b);
}

function toText(value: ColumnValue | undefined): string | null {
  if (value === null || value === undefined) return null;
  return String(value);
}

// ids follow the API's :id rule (trimmed, 1 to 255 characters)
function toId(value: ColumnValue | undefined): string | null {
  const parsed = SongIdSchema.safeParse(toText(value));
  return parsed.success ? parsed.data : null;
}

function toNumber(value: ColumnValue | undefined): number | null {
  if (value === null || value === undefined || value === '') return null;
  const num = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(num) ? num : null;
}

@Injectable()
export class IngestionService {
  private readonly logger = new Logger(IngestionService.name);

  constructor(private db: DatabaseService) {}

  async loadFile(filePath: string): Promise<ColumnarSongExport> {
    const raw = await readFile(filePath, 'utf-8');

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (error) {
      throw new ValidationError(
        `${filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      );
    }

    const columns = parseInput(
      ColumnarSongExportSchema,
      data,
      'Expected an object of attribute -> row index -> value',
    );
    this.logger.log(`Loaded ${filePath} with ${Object.keys(columns).length} attributes`);
    return columns;
  }

  /**
   * Turns the columnar export into one record per row index. Row indices are
   * the union of every column's keys; a column missing a row yields null.
   */
  normalize(columns: ColumnarSongExport): NormalizedSongRecord[] {
    const attributes = Object.keys(columns);
    const indices = new Set<string>();
    for (const attribute of attributes) {
      for (const index of Object.keys(columns[attribute])) {
        indices.add(index);
      }
    }

    const records = [...indices].sort(compareRowIndex).map((index) => {
      const values: Record<string, ColumnValue> = {};
      for (const attribute of attributes) {
        values[attribute] = columns[attribute][index] ?? null;
      }
      return Object.assign(values, { current_rating: null });
    });

    this.logger.log(`Normalized ${records.length} song records`);
    return records;
  }

  async ensureSchema(): Promise<void> {
    const sql = await readFile(SCHEMA_PATH, 'utf-8');
    await this.db.query(sql);
    this.logger.log('Database schema ready');
  }

  async upsertSongs(records: NormalizedSongRecord[]): Promise<IngestionResult> {
    const rows: unknown[][] = [];
    let skipped = 0;

    for (const record of records) {
      const id = toId(record.id);
      if (!id) {
        skipped++;
        continue;
      }
      rows.push([
        id,
        toText(record.title),
        ...AUDIO_FEATURE_COLUMNS.map((column) => this.featureValue(id, column, record[column])),
      ]);
    }

    if (skipped > 0) {
      this.logger.warn(`Skipped ${skipped} records without a usable id`);
    }

    await this.db.transaction(async (tx) => {
      for (const params of rows) {
        await tx.query(UPSERT_SQL, params);
      }
    });

    this.logger.log(`Upserted ${rows.length} songs`);
    return { inserted: rows.length, skipped };
  }

  private featureValue(
    id: string,
    column: AudioFeatureColumn,
    value: ColumnValue | undefined,
  ): number | null {
    const num = toNumber(value);
    if (num === null || !INTEGER_COLUMNS.has(column) || Number.isInteger(num)) {
      return num;
    }

    const rounded = Math.round(num);
    this.logger.warn(`Song ${id}: ${column} ${num} rounded to ${rounded} for an integer column`);
    return rounded;
  }

  async exportJson(records: NormalizedSongRecord[], outputPath: string): Promise<void> {
    await writeFile(outputPath, `${JSON.stringify(records, null, 2)}\n`, 'utf-8');
    this.logger.log(`Normalized data exported to ${outputPath}`);
  }

  async ingestFile(filePath: string, options: IngestOptions = {}): Promise<IngestSummary> {
    const columns = await this.loadFile(filePath);
    const records = this.normalize(columns);

    await this.ensureSchema();
    const result = await this.upsertSongs(records);

    if (options.exportPath) {
      await this.exportJson(records, options.exportPath);
    }

    return { records: records.length, ...result };
  }
}
