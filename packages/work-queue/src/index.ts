export { WORK_QUEUE } from './config/constants';
export { LeaseLostError } from './errors/lease-lost-error';
export {
  WorkQueue,
  computeWorkItemId,
  systemClock,
  type Clock,
  type WorkQueueOptions,
} from './work-queue';
