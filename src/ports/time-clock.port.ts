/**
 * Wall clock, injected so checkpoint timestamps and TTL eviction are
 * testable without fake timers.
 */
export interface TimeClockPort {
  nowMs(): number;
}
