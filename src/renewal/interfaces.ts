/**
 * Configuration for the renewal scheduler.
 */
export interface RenewalConfig {
  /** Hours of the day (0-23) at which the renewal check fires. */
  hours: number[];
}
