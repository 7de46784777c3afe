/**
 * @chartlane/jobs - single-flight FIFO chart load queue
 */

export { ChartLoadQueue } from './chart-load-queue.js';
export type { ChartLoader } from './chart-load-queue.js';
