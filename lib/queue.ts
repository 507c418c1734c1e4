import { Queue } from 'bullmq';
import { getRedis } from './redis';
import type { ValuationJobData, ValuationJobName, ValuationJobResult } from './valuation/jobs';

export const VALUATION_QUEUE_NAME = process.env.VALUATION_QUEUE_NAME || 'valuation-queue';

export type ValuationQueue = Queue<ValuationJobData, ValuationJobResult, ValuationJobName>;

let valuationQueue: ValuationQueue | undefined;

// Producer side (API routes)
export function getValuationQueue(): ValuationQueue {
  if (!valuationQueue) {
    valuationQueue = new Queue<ValuationJobData, ValuationJobResult, ValuationJobName>(
      VALUATION_QUEUE_NAME,
      {
        connection: getRedis(),
        defaultJobOptions: {
          attempts: 1, // no retries
          removeOnComplete: 100, // keep the latest 100 results for polling
          removeOnFail: 500,
        },
      }
    );
  }
  return valuationQueue;
}
