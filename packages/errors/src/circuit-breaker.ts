import CircuitBreaker from "opossum";

export interface CircuitBreakerOptions {
  /** Timeout in milliseconds after which the call is considered failed; `false` disables it. Default: 30000 */
  timeout?: number | false;
  /** Error percentage at which to open the circuit. Default: 50 */
  errorThresholdPercentage?: number;
  /** Time in milliseconds to wait before attempting to close the circuit. Default: 30000 */
  resetTimeout?: number;
  /** Rolling count timeout in milliseconds. Default: 10000 */
  rollingCountTimeout?: number;
  /** Number of buckets in the rolling window. Default: 10 */
  rollingCountBuckets?: number;
  /** Receives state transitions. Defaults to a console warning. */
  onStateChange?: (name: string, state: "open" | "halfOpen" | "close") => void;
}

const DEFAULT_OPTIONS: Required<
  Pick<CircuitBreakerOptions, "timeout" | "errorThresholdPercentage" | "resetTimeout">
> = {
  timeout: 30_000,
  errorThresholdPercentage: 50,
  resetTimeout: 30_000,
};

const STATE_LABELS = {
  open: "OPENED (requests will be short-circuited)",
  halfOpen: "HALF-OPEN (next request is a test)",
  close: "CLOSED (back to normal)",
} as const;

function warnStateChange(name: string, state: keyof typeof STATE_LABELS): void {
  console.warn(`[circuit-breaker] ${name}: circuit ${STATE_LABELS[state]}`);
}

export function createCircuitBreaker<TI extends unknown[], TR>(
  name: string,
  fn: (...args: TI) => Promise<TR>,
  options?: CircuitBreakerOptions,
): CircuitBreaker<TI, TR> {
  const { onStateChange = warnStateChange, ...breakerOptions } = options ?? {};
  const mergedOptions = { ...DEFAULT_OPTIONS, ...breakerOptions, name };

  const breaker = new CircuitBreaker(fn, mergedOptions);

  breaker.on("open", () => onStateChange(name, "open"));
  breaker.on("halfOpen", () => onStateChange(name, "halfOpen"));
  breaker.on("close", () => onStateChange(name, "close"));

  return breaker;
}
