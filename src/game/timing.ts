/** Per-tick timing handed down from the fixed-step loop. */
export interface TickTiming {
  /** Length of this tick in ms. */
  dtMs: number;
  /** Simulation time since the session started, in ms. */
  totalMs: number;
}
