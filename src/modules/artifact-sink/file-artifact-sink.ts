/**
 * FileArtifactSink — writes a run's artifacts under `<outputDir>/<runId>/`:
 *
 *   <role>.json          one per succeeded role
 *   report.md            when a report was produced
 *   summary.json         the full run summary
 *   summary.md           human-readable summary
 *   charts/<role>.json   line chart specs, when charts are enabled
 */

import { mkdir, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { PersistenceError } from '../../core/errors.js'
import { createLogger } from '../../utils/logger.js'
import type { ArtifactSink, RunArtifacts } from './artifact-sink.js'
import { buildChartSpecs } from './chart-specs.js'
import { renderSummaryMarkdown } from './summary-markdown.js'

const logger = createLogger('artifact-sink:file')

export class FileArtifactSink implements ArtifactSink {
  readonly name = 'file'
  private readonly _outputDir: string

  constructor(outputDir: string) {
    this._outputDir = outputDir
  }

  /** Directory the artifacts of `runId` go to */
  runDir(runId: string): string {
    return join(this._outputDir, runId)
  }

  async emit(artifacts: RunArtifacts): Promise<void> {
    const { summary, results, report, inputs, enableCharts } = artifacts
    const dir = this.runDir(summary.runId)
    const written: string[] = []

    const write = async (relative: string, content: string): Promise<void> => {
      await writeFile(join(dir, relative), content, 'utf-8')
      written.push(relative)
    }

    try {
      await mkdir(dir, { recursive: true })
      for (const result of results) {
        await write(`${result.role}.json`, toJson(result))
      }
      if (report !== undefined) {
        await write('report.md', report.content.endsWith('\n') ? report.content : `${report.content}\n`)
      }
      await write('summary.json', toJson(summary))
      await write('summary.md', renderSummaryMarkdown(summary))

      if (enableCharts) {
        const charts = inputs.map(buildChartSpecs).filter((c) => c.charts.length > 0)
        if (charts.length > 0) await mkdir(join(dir, 'charts'), { recursive: true })
        for (const spec of charts) {
          await write(join('charts', `${spec.role}.json`), toJson(spec))
        }
      }
    } catch (err: unknown) {
      const msg = err instanceof Error ? err.message : String(err)
      throw new PersistenceError(`Failed to write run artifacts to "${dir}": ${msg}`, { dir, written })
    }

    logger.info({ dir, files: written.length }, 'Run artifacts written')
  }
}

function toJson(value: unknown): string {
  return `${JSON.stringify(value, null, 2)}\n`
}
