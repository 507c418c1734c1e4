/**
 * Valuation Worker (BullMQ)
 *
 * Job Types:
 * - DcfValuationJob      base-case valuation + insights
 * - SensitivityGridJob   WACC × terminal growth sweep
 * - WaccSensitivityJob   ±1pp WACC sensitivity scalar
 */

import { Worker, Job } from 'bullmq';
import { getRedis, redisTarget } from './lib/redis';
import { VALUATION_QUEUE_NAME } from './lib/queue';
import {
  isValuationError,
  processValuationJob,
  VALUATION_JOB_NAMES,
  type ValuationJobData,
  type ValuationJobName,
  type ValuationJobResult,
} from './lib/valuation';

console.log('[Worker] Starting Valuation Worker...');
console.log(`[Worker] Queue: ${VALUATION_QUEUE_NAME}`);
console.log(`[Worker] Redis: ${redisTarget()}`);

// ============================================================================
// Worker Definition
// ============================================================================

const worker = new Worker<ValuationJobData, ValuationJobResult, ValuationJobName>(
  VALUATION_QUEUE_NAME,
  async (job: Job<ValuationJobData, ValuationJobResult, ValuationJobName>) => {
    console.log(`[Worker] 🔄 Processing Job: ${job.name} (ID: ${job.id})`);

    try {
      const result = processValuationJob(job.name, job.data);

      if ('status' in result) {
        console.warn(`[Worker] ⚠️  Unknown job type: ${result.name}`);
      }
      return result;
    } catch (error) {
      if (isValuationError(error)) {
        console.error(`[Worker] ❌ Job ${job.name} rejected: ${error.code} ${error.message}`);
      } else {
        console.error(`[Worker] ❌ Job ${job.name} failed:`, error);
      }
      throw error;
    }
  },
  {
    connection: getRedis(),
    concurrency: parseInt(process.env.WORKER_CONCURRENCY || '3', 10),
  }
);

// ============================================================================
// Event Handlers
// ============================================================================

worker.on('completed', (job) => {
  console.log(`[Worker] ✅ Job ${job.id} (${job.name}) completed!`);
});

worker.on('failed', (job, err) => {
  console.error(`[Worker] ❌ Job ${job?.id} (${job?.name}) failed: ${err.message}`);
});

worker.on('error', (err) => {
  console.error('[Worker] ⚠️  Worker error:', err);
});

// ============================================================================
// Graceful Shutdown
// ============================================================================

const shutdown = async (signal: string) => {
  console.log(`[Worker] 🛑 ${signal} received, shutting down gracefully...`);
  await worker.close();
  await getRedis().quit();
  process.exit(0);
};

process.on('SIGTERM', () => {
  shutdown('SIGTERM').catch((err) => {
    console.error('[Worker] Shutdown failed:', err);
    process.exit(1);
  });
});

process.on('SIGINT', () => {
  shutdown('SIGINT').catch((err) => {
    console.error('[Worker] Shutdown failed:', err);
    process.exit(1);
  });
});

console.log(`[Worker] ✅ Worker listening on queue: ${VALUATION_QUEUE_NAME}`);
console.log('[Worker] 📝 Available job types:');
for (const name of VALUATION_JOB_NAMES) {
  console.log(`  - ${name}`);
}
