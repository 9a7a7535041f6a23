export interface TimePort {
  /** Milliseconds since the epoch. */
  now(): number;
}
