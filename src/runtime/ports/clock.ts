/**
 * Wall-clock port.
 *
 * The pending-call sweeper ages records with it; tests swap in a fake so
 * eviction can be driven without sleeping.
 */
export interface Clock {
  nowMs(): number;
}
