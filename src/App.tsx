import { useEffect, useRef, useState, useSyncExternalStore } from 'react';
import { FIELD_SIZE, ORBIT_TICK_MS } from './lib/config';
import { alertForStatus, guessesLabel } from './lib/feedback';
import { startOrbitTicker, type OrbitFrame } from './lib/orbit';
import { isTerminal } from './lib/round';
import type { RoundController } from './lib/round-controller';
import type { Body, Point } from './lib/types';
import './styles.css';

const CENTER: Point = { x: FIELD_SIZE / 2, y: FIELD_SIZE / 2 };

const starPath = (r: number) => {
  const points: string[] = [];
  for (let i = 0; i < 10; i++) {
    const radius = i % 2 === 0 ? r : r * 0.45;
    const angle = -Math.PI / 2 + (i * Math.PI) / 5;
    points.push(`${(Math.cos(angle) * radius).toFixed(2)},${(Math.sin(angle) * radius).toFixed(2)}`);
  }
  return `M${points.join('L')}Z`;
};

const heartPath = (r: number) =>
  `M0,${r * 0.9} C${-r * 1.6},${-r * 0.2} ${-r * 0.6},${-r * 1.3} 0,${-r * 0.4} C${r * 0.6},${-r * 1.3} ${r * 1.6},${-r * 0.2} 0,${r * 0.9}Z`;

const BodyGlyph = ({ body, revealed }: { body: Body; revealed: boolean }) => {
  // tiny stars get a larger heart so the reveal is visible
  if (revealed) return <path className="body-heart" d={heartPath(Math.max(body.radius, 10))} fill="#ff375f" />;
  if (body.kind === 'stationary' && body.shape === 'star') return <path d={starPath(body.radius)} fill={body.color} />;
  return <circle r={body.radius} fill={body.color} className={body.kind === 'stationary' ? 'body-sun' : undefined} />;
};

export default function App({ controller }: { controller: RoundController }) {
  const round = useSyncExternalStore(controller.subscribe, controller.getSnapshot);
  const [frame, setFrame] = useState<OrbitFrame | null>(null);
  const bodiesRef = useRef(round.bodies);
  bodiesRef.current = round.bodies;

  useEffect(() => {
    const ticker = startOrbitTicker({
      getBodies: () => bodiesRef.current,
      onFrame: setFrame,
      center: CENTER,
      intervalMs: ORBIT_TICK_MS
    });
    return () => ticker.stop();
  }, []);

  const alert = alertForStatus(round.status);
  const finished = isTerminal(round);
  const revealedId = round.status === 'won' ? round.specialId : null;

  return (
    <main className="app-shell">
      <header className="hud">
        <h1 className="hud-title">Find the missing heart</h1>
        <p className="hud-guesses" aria-live="polite">{guessesLabel(round)}</p>
      </header>

      <svg className="field" viewBox={`0 0 ${FIELD_SIZE} ${FIELD_SIZE}`} width={FIELD_SIZE} height={FIELD_SIZE}>
        {round.bodies.map((body) => {
          const position = frame?.positions.get(body.id) ?? (body.kind === 'stationary' ? body.position : CENTER);
          return (
            <g
              key={body.id}
              className={`body body-${body.kind}${finished ? ' is-locked' : ''}`}
              transform={`translate(${position.x} ${position.y})`}
              onClick={finished ? undefined : () => controller.tap(body.id)}
            >
              <title>{body.name}</title>
              <BodyGlyph body={body} revealed={body.id === revealedId} />
            </g>
          );
        })}
      </svg>

      {alert && (
        <div className="outcome-backdrop">
          <div className={`outcome-modal outcome-${alert.tone}`} role="dialog" aria-modal="true" aria-label={alert.title}>
            <h3>{alert.title}</h3>
            <p className="muted">{alert.message}</p>
            <div className="btn-row">
              <button className="btn btn-primary" onClick={controller.reset}>
                {alert.action}
              </button>
            </div>
          </div>
        </div>
      )}
    </main>
  );
}
