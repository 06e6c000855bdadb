import { setTimeout as sleep } from 'node:timers/promises';
import type { Logger } from '@cohortforge/shared';
import { assemble } from '../assembly/assembler';
import type { ArtifactCatalog } from '../catalog/types';
import type { ReconciliationPolicy, RunMode, TieBreakPolicy } from '../config/serviceConfig';
import { IngestError, describeError, transformError } from '../errors';
import { ClinicalLookup } from '../metadata/clinical';
import type { ClinicalTable } from '../metadata/types';
import { createTransformer } from '../transform';
import type { SampleTransformer } from '../transform';
import type {
  ArtifactRef,
  AssembledDataset,
  BatchReport,
  FeatureFilterSet,
  SampleArtifact,
  TransformResult,
  TransformedUnit,
  UnitFailure
} from '../types';
import { err } from '../types';
import { createWorkerPool } from './workerPool';
import type { TaskOutcome } from './workerPool';

export type OrchestratorOptions = {
  catalog: ArtifactCatalog;
  loadFilterSet: () => Promise<FeatureFilterSet>;
  orientation: 'row' | 'matrix';
  mode: RunMode;
  concurrency: number;
  sequentialDelayMs: number;
  reconciliation: ReconciliationPolicy;
  clinicalTieBreak: TieBreakPolicy;
  persistClinicalTable?: ((cohortId: string, table: ClinicalTable) => Promise<void>) | null;
  logger: Logger;
};

export type BuildResult = {
  dataset: AssembledDataset;
  report: BatchReport;
  units: TransformedUnit[];
};

type UnitOutcome = { ref: ArtifactRef; result: TransformResult };

export class DatasetOrchestrator {
  private readonly options: OrchestratorOptions;

  constructor(options: OrchestratorOptions) {
    this.options = options;
  }

  private async prepareTransformer(cohortId: string): Promise<SampleTransformer> {
    const { orientation, reconciliation, catalog } = this.options;
    if (orientation === 'matrix') {
      const matrix = await catalog.fetchMatrix(cohortId);
      return createTransformer({ orientation, reconciliation, matrix });
    }
    return createTransformer({ orientation, reconciliation });
  }

  private async processArtifact(
    ref: ArtifactRef,
    transformer: SampleTransformer,
    filterSet: FeatureFilterSet,
    lookup: ClinicalLookup
  ): Promise<UnitOutcome> {
    const { catalog } = this.options;
    let artifact: SampleArtifact;
    try {
      artifact = transformer.needsPayload ? await catalog.fetchArtifact(ref) : await catalog.fetchSideChannel(ref);
    } catch (error) {
      return { ref, result: err(transformError('FetchFailed', describeError(error))) };
    }
    return { ref, result: transformer.transform(artifact, filterSet, lookup) };
  }

  /**
   * Lists, fetches and transforms every artifact of a cohort with bounded
   * parallelism, then assembles the successful units. Per-artifact failures
   * are recorded in the report; only batch-level conditions throw.
   */
  async buildDataset(cohortId: string, concurrencyLimit: number = this.options.concurrency): Promise<BuildResult> {
    try {
      return await this.runBatch(cohortId, concurrencyLimit);
    } finally {
      this.options.catalog.release?.(cohortId);
    }
  }

  private async runBatch(cohortId: string, concurrencyLimit: number): Promise<BuildResult> {
    const { catalog, mode, sequentialDelayMs } = this.options;
    const logger = this.options.logger.child({ cohortId });
    const started = Date.now();
    const limit = mode === 'sequential' ? 1 : concurrencyLimit;
    const pool = createWorkerPool(limit);

    const refs = await catalog.listArtifacts(cohortId);
    if (refs.length === 0) {
      const report = buildReport(cohortId, mode, 0, [], started);
      logger.error({ report }, 'No artifacts found for cohort');
      throw new IngestError(`No artifacts found for cohort ${cohortId}`, 'NO_ARTIFACTS_FOUND', {
        details: { cohortId },
        report
      });
    }

    const filterSet = await this.options.loadFilterSet();
    const clinicalTable = await catalog.fetchClinicalTable(cohortId);
    if (this.options.persistClinicalTable) {
      await this.options.persistClinicalTable(cohortId, clinicalTable);
    }
    const lookup = new ClinicalLookup(clinicalTable, this.options.clinicalTieBreak);
    const transformer = await this.prepareTransformer(cohortId);

    logger.info(
      {
        artifacts: refs.length,
        mode,
        concurrency: limit,
        orientation: transformer.orientation,
        filteredFeatures: filterSet.size,
        clinicalRecords: clinicalTable.length
      },
      'Dispatching artifacts'
    );

    const tasks = refs.map((ref, index) => async (): Promise<UnitOutcome> => {
      if (mode === 'sequential' && index > 0 && sequentialDelayMs > 0) {
        await sleep(sequentialDelayMs);
      }
      return this.processArtifact(ref, transformer, filterSet, lookup);
    });

    const units: TransformedUnit[] = [];
    const failures: UnitFailure[] = [];
    await pool.runAll(tasks, (outcome: TaskOutcome<UnitOutcome>) => {
      const ref = refs[outcome.index];
      const result: TransformResult =
        outcome.status === 'fulfilled'
          ? outcome.value.result
          : err(transformError('TaskFailed', describeError(outcome.reason)));
      if (result.ok) {
        units.push(result.value);
        logger.debug({ artifactKey: ref.key, features: result.value.features.length }, 'Transformed artifact');
        return;
      }
      failures.push({ artifactKey: ref.key, sampleId: ref.sampleId, kind: result.error.kind, message: result.error.message });
      logger.warn({ artifactKey: ref.key, kind: result.error.kind, reason: result.error.message }, 'Artifact skipped');
    });

    const report = buildReport(cohortId, mode, refs.length, failures, started);
    if (units.length === 0) {
      logger.error({ report }, 'Every artifact failed');
      throw new IngestError(`All ${refs.length} artifacts failed for cohort ${cohortId}`, 'ALL_TRANSFORMS_FAILED', {
        details: { cohortId },
        report
      });
    }

    const dataset = assemble(units, transformer.orientation);
    const summary = {
      attempted: report.attempted,
      succeeded: report.succeeded,
      failed: report.failed,
      durationMs: report.durationMs
    };
    if (report.failed > 0) {
      logger.warn({ ...summary, failures: report.failures }, 'Cohort assembled with failures');
    } else {
      logger.info(summary, 'Cohort assembled');
    }
    return { dataset, report, units };
  }
}

function buildReport(
  cohortId: string,
  mode: RunMode,
  attempted: number,
  failures: UnitFailure[],
  started: number
): BatchReport {
  const finished = Date.now();
  return {
    cohortId,
    mode,
    attempted,
    succeeded: attempted - failures.length,
    failed: failures.length,
    failures,
    startedAt: new Date(started).toISOString(),
    finishedAt: new Date(finished).toISOString(),
    durationMs: finished - started
  };
}
