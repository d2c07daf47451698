import type { Body, BodyId, Point } from './types';

// Angle advanced per millisecond for an orbit speed of 1; slower orbits divide it.
export const ANGLE_STEP_PER_MS = 0.01;
const TWO_PI = 2 * Math.PI;

export function orbitAngle(body: Body, elapsedMs: number) {
  if (body.kind !== 'orbiting' || body.orbitSpeed <= 0) return 0;
  const angle = (elapsedMs * ANGLE_STEP_PER_MS) / body.orbitSpeed;
  return ((angle % TWO_PI) + TWO_PI) % TWO_PI;
}

export function bodyPosition(body: Body, elapsedMs: number, center: Point): Point {
  if (body.kind === 'stationary') return body.position;
  const angle = orbitAngle(body, elapsedMs);
  return {
    x: center.x + Math.cos(angle) * body.orbitRadius,
    y: center.y + Math.sin(angle) * body.orbitRadius
  };
}

export interface OrbitFrame {
  elapsedMs: number;
  positions: ReadonlyMap<BodyId, Point>;
}

export function computeFrame(bodies: readonly Body[], elapsedMs: number, center: Point): OrbitFrame {
  const positions = new Map<BodyId, Point>();
  for (const body of bodies) positions.set(body.id, bodyPosition(body, elapsedMs, center));
  return { elapsedMs, positions };
}

type IntervalHandle = ReturnType<typeof setInterval>;

export interface TickerTimers {
  setInterval: (fn: () => void, ms: number) => IntervalHandle;
  clearInterval: (handle: IntervalHandle) => void;
}

export interface OrbitTickerOptions {
  // Read-only view of the bodies on screen; the ticker never writes back.
  getBodies: () => readonly Body[];
  onFrame: (frame: OrbitFrame) => void;
  center: Point;
  intervalMs: number;
  now?: () => number;
  timers?: TickerTimers;
}

export interface OrbitTicker {
  stop: () => void;
  readonly running: boolean;
}

const globalTimers: TickerTimers = {
  setInterval: (fn, ms) => setInterval(fn, ms),
  clearInterval: (handle) => clearInterval(handle)
};

/**
 * Emits body positions every `intervalMs` until stopped. The first frame is
 * emitted synchronously so the field renders at angle 0 straight away.
 */
export function startOrbitTicker({
  getBodies,
  onFrame,
  center,
  intervalMs,
  now = () => Date.now(),
  timers = globalTimers
}: OrbitTickerOptions): OrbitTicker {
  const startedAt = now();
  let handle: IntervalHandle | null = null;

  const tick = () => onFrame(computeFrame(getBodies(), now() - startedAt, center));

  tick();
  handle = timers.setInterval(tick, intervalMs);

  return {
    stop: () => {
      if (handle === null) return;
      timers.clearInterval(handle);
      handle = null;
    },
    get running() {
      return handle !== null;
    }
  };
}
