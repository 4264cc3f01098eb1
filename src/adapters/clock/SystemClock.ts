import { IClock } from '@/interfaces/IClock';

/**
 * Wall-clock time of the host
 */
export class SystemClock implements IClock {
  now(): Date {
    return new Date();
  }
}
