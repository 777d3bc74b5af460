/**
 * CsvDataProvider — RawDataProvider backed by a directory of CSV files.
 *
 * Logical dataset names (e.g. `gdp`) resolve to files in this order:
 *   1. the entry in the YAML mapping file (`gdp: { file: GDP_2015_2024.csv }`)
 *   2. a file of that name in the data directory (`.csv` appended if missing)
 *   3. the first CSV (sorted by name) whose name contains the logical name,
 *      case-insensitively
 *
 * Parsed files are cached for the lifetime of the provider.
 */

import { readFile, readdir, access } from 'node:fs/promises'
import { join } from 'node:path'
import yaml from 'js-yaml'
import { parse } from 'csv-parse/sync'
import { z } from 'zod'
import { ConfigurationError, InputNotFoundError } from '../../core/errors.js'
import type { RoleName } from '../../core/types.js'
import { createLogger } from '../../utils/logger.js'
import type { DatasetDescription, DatasetSummary, RawDataProvider, RoleInput } from './data-provider.js'
import { summarizeTable } from './dataset-summary.js'

const logger = createLogger('data:csv')

// ---------------------------------------------------------------------------
// Mapping file schema
// ---------------------------------------------------------------------------

const MappingEntrySchema = z
  .object({
    file: z.string().min(1).optional(),
    actual_file: z.string().min(1).optional(),
    description: z.string().optional(),
  })
  .refine((entry) => entry.file !== undefined || entry.actual_file !== undefined, {
    message: 'either "file" or "actual_file" is required',
  })

export const DatasetMappingSchema = z.record(z.string(), MappingEntrySchema)

export interface MappedDataset {
  file: string
  description?: string
}

const CsvRowsSchema = z.array(z.array(z.string()))

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface CsvDataProviderOptions {
  /** Directory holding the CSV files */
  rootDir: string
  /** YAML file mapping logical dataset names to files */
  mappingFile?: string
  /** Logical datasets each role reads */
  datasetsByRole: Record<RoleName, readonly string[]>
  /** Cap on chart series length per dataset (default 200) */
  maxSeriesPoints?: number
}

// ---------------------------------------------------------------------------
// CsvDataProvider
// ---------------------------------------------------------------------------

export class CsvDataProvider implements RawDataProvider {
  private readonly _options: CsvDataProviderOptions
  private _mapping: Promise<Record<string, MappedDataset>> | undefined
  private readonly _cache = new Map<string, DatasetSummary>()

  constructor(options: CsvDataProviderOptions) {
    this._options = options
  }

  async loadInput(role: RoleName): Promise<RoleInput> {
    const names = this._options.datasetsByRole[role] ?? []
    const datasets: DatasetSummary[] = []
    const missing: string[] = []

    for (const name of names) {
      const summary = await this.loadDataset(name)
      if (summary === null) missing.push(name)
      else datasets.push(summary)
    }

    if (missing.length > 0) {
      logger.warn({ role, missing, rootDir: this._options.rootDir }, 'Datasets not found')
      throw new InputNotFoundError(role, { missing })
    }

    return { role, datasets }
  }

  async describe(): Promise<DatasetDescription[]> {
    const mapping = await this.mapping()
    const descriptions: DatasetDescription[] = []
    for (const [name, entry] of Object.entries(mapping)) {
      const description: DatasetDescription = {
        name,
        file: entry.file,
        exists: await fileExists(join(this._options.rootDir, entry.file)),
      }
      if (entry.description !== undefined) description.description = entry.description
      descriptions.push(description)
    }
    return descriptions
  }

  /**
   * Load and summarize one logical dataset; `null` when no file resolves.
   * @throws {ConfigurationError} when the file exists but is not a usable CSV
   */
  async loadDataset(name: string): Promise<DatasetSummary | null> {
    const cached = this._cache.get(name)
    if (cached !== undefined) return cached

    const resolved = await this.resolve(name)
    if (resolved === null) return null

    const path = join(this._options.rootDir, resolved.file)
    const raw = await readFile(path, 'utf-8')
    const rows = parseCsv(raw, path)
    const [header, ...body] = rows
    if (header === undefined) {
      throw new ConfigurationError(`Dataset "${name}" is empty`, [], { path })
    }

    const summary = summarizeTable({
      name,
      file: resolved.file,
      header,
      rows: body,
      ...(resolved.description !== undefined ? { description: resolved.description } : {}),
      ...(this._options.maxSeriesPoints !== undefined
        ? { maxSeriesPoints: this._options.maxSeriesPoints }
        : {}),
    })
    this._cache.set(name, summary)
    logger.debug({ name, file: resolved.file, rows: summary.rowCount }, 'Dataset loaded')
    return summary
  }

  /** Resolve a logical name to an existing file in the data directory */
  async resolve(name: string): Promise<MappedDataset | null> {
    const { rootDir } = this._options
    const mapping = await this.mapping()

    const mapped = mapping[name]
    if (mapped !== undefined && (await fileExists(join(rootDir, mapped.file)))) {
      return mapped
    }

    const direct = name.toLowerCase().endsWith('.csv') ? name : `${name}.csv`
    if (await fileExists(join(rootDir, direct))) {
      return { file: direct }
    }

    const needle = name.toLowerCase()
    const candidates = (await listCsvFiles(rootDir)).filter((f) => f.toLowerCase().includes(needle))
    const match = candidates[0]
    if (match !== undefined) {
      logger.debug({ name, file: match }, 'Resolved dataset by file name match')
      return mapped?.description !== undefined ? { file: match, description: mapped.description } : { file: match }
    }

    return null
  }

  private mapping(): Promise<Record<string, MappedDataset>> {
    this._mapping ??= loadMapping(this._options.mappingFile)
    return this._mapping
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * Read and validate a dataset mapping file. A missing file yields an empty
 * mapping; an invalid one raises ConfigurationError.
 */
export async function loadMapping(mappingFile: string | undefined): Promise<Record<string, MappedDataset>> {
  if (mappingFile === undefined) return {}

  let raw: string
  try {
    raw = await readFile(mappingFile, 'utf-8')
  } catch {
    logger.warn({ mappingFile }, 'Dataset mapping file not found, using file name resolution only')
    return {}
  }

  let parsed: unknown
  try {
    parsed = yaml.load(raw)
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err)
    throw new ConfigurationError(`Dataset mapping "${mappingFile}" contains invalid YAML`, [msg])
  }

  const result = DatasetMappingSchema.safeParse(parsed ?? {})
  if (!result.success) {
    throw new ConfigurationError(
      `Dataset mapping "${mappingFile}" failed validation`,
      result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    )
  }

  const mapping: Record<string, MappedDataset> = {}
  for (const [name, entry] of Object.entries(result.data)) {
    const file = entry.file ?? entry.actual_file ?? ''
    mapping[name] = entry.description !== undefined ? { file, description: entry.description } : { file }
  }
  return mapping
}

function parseCsv(raw: string, path: string): string[][] {
  let records: unknown
  try {
    records = parse(raw, { bom: true, skip_empty_lines: true, relax_column_count: true, trim: true })
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err)
    throw new ConfigurationError(`Cannot parse CSV file "${path}"`, [msg])
  }
  const result = CsvRowsSchema.safeParse(records)
  if (!result.success) {
    throw new ConfigurationError(`Unexpected CSV structure in "${path}"`)
  }
  return result.data
}

async function listCsvFiles(dir: string): Promise<string[]> {
  try {
    const entries = await readdir(dir)
    return entries.filter((f) => f.toLowerCase().endsWith('.csv')).sort()
  } catch {
    return []
  }
}

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path)
    return true
  } catch {
    return false
  }
}

export function createCsvDataProvider(options: CsvDataProviderOptions): CsvDataProvider {
  return new CsvDataProvider(options)
}
