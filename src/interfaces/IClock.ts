/**
 * Clock Interface
 * Source of "now" for transaction timestamps and the daily withdrawal window
 */
export interface IClock {
  now(): Date;
}
