import process from 'node:process';
import { EnvConfigError } from '@cohortforge/shared';
import { loadIngestConfig } from './config/serviceConfig';
import { createIngestRuntime, discoverCohorts, runPipeline } from './pipeline';

const start = async () => {
  const config = loadIngestConfig();
  const runtime = createIngestRuntime(config);
  let cohorts = process.argv.slice(2).length > 0 ? process.argv.slice(2) : config.cohorts;
  if (cohorts.length === 0) {
    cohorts = await discoverCohorts(runtime);
  }

  if (cohorts.length === 0) {
    runtime.logger.error(
      'No cohorts given; pass cohort ids as arguments, set COHORT_INGEST_COHORTS or configure a COHORT_INGEST_GEO_* search'
    );
    process.exitCode = 1;
    return;
  }

  const summaries = await runPipeline(runtime, cohorts);
  const failed = summaries.filter((summary) => summary.status === 'failed');
  runtime.logger.info(
    { cohorts: summaries.length, failed: failed.map((summary) => summary.cohortId) },
    'Ingestion run finished'
  );
  if (failed.length > 0) {
    process.exitCode = 1;
  }
};

start().catch((error) => {
  if (error instanceof EnvConfigError) {
    // eslint-disable-next-line no-console
    console.error(error.message);
  } else {
    // eslint-disable-next-line no-console
    console.error('Uncaught error in cohort ingest', error);
  }
  process.exit(1);
});
