import { DEFAULT_GAME_CONFIG } from '../src/lib/config';
import { createSeededRandom, pickOne } from '../src/lib/rng';
import { evaluateGuess, isTerminal, reset, startRound } from '../src/lib/round';
import type { Round } from '../src/lib/types';

const isCiMode = process.argv.includes('--ci');
const ROUND_COUNT = isCiMode ? 2000 : 20000;
// allowed drift of any body's special share from 1/n
const UNIFORMITY_TOLERANCE = isCiMode ? 0.35 : 0.15;

const failures: string[] = [];

const check = (condition: boolean, message: string) => {
  if (!condition) failures.push(message);
};

const percent = (n: number, total: number) => ((n / total) * 100).toFixed(2);

const config = DEFAULT_GAME_CONFIG;
const random = createSeededRandom('verify-rounds');
const specialCounts: Record<string, number> = {};
const outcomes = { won: 0, lost: 0 };
let guessesSpent = 0;

const playOut = (start: Round, index: number) => {
  let round = start;
  let steps = 0;
  while (!isTerminal(round)) {
    const target = pickOne(random, round.bodies);
    const before = round;
    const result = evaluateGuess(round, target.id);
    check(result.outcome !== 'rejected', `round ${index}: guess on ${target.id} was rejected`);
    round = result.round;
    steps += 1;

    if (result.outcome === 'won') {
      check(round.bodies === before.bodies, `round ${index}: winning guess changed the bodies`);
      check(round.remainingGuesses === before.remainingGuesses, `round ${index}: winning guess cost a guess`);
    } else {
      check(round.bodies.length === before.bodies.length - 1, `round ${index}: miss did not remove one body`);
      check(round.remainingGuesses === before.remainingGuesses - 1, `round ${index}: miss did not cost one guess`);
    }
    check(steps <= config.guessBudget, `round ${index}: played past the guess budget`);
  }

  const late = evaluateGuess(round, round.specialId);
  check(late.outcome === 'rejected' && late.round === round, `round ${index}: late guess was not ignored`);
  if (round.status === 'lost') {
    check(round.remainingGuesses === 0, `round ${index}: lost with guesses left`);
  }
  guessesSpent += config.guessBudget - round.remainingGuesses;
  return round;
};

let round = startRound(config, random);
const catalogSize = round.bodies.length;

for (let i = 0; i < ROUND_COUNT; i++) {
  check(round.bodies.length === catalogSize, `round ${i}: started with ${round.bodies.length} bodies`);
  check(round.remainingGuesses === config.guessBudget, `round ${i}: started with ${round.remainingGuesses} guesses`);
  check(new Set(round.bodies.map((b) => b.id)).size === catalogSize, `round ${i}: duplicate body ids`);
  check(round.bodies.some((b) => b.id === round.specialId), `round ${i}: special body not in play`);
  specialCounts[round.specialId] = (specialCounts[round.specialId] ?? 0) + 1;

  const finished = playOut(round, i);
  if (finished.status === 'won') outcomes.won += 1;
  else outcomes.lost += 1;
  round = reset(config, random);
}

const expectedShare = 1 / catalogSize;
console.log(`\n=== Special body distribution (${ROUND_COUNT} rounds, ${catalogSize} bodies) ===`);
for (const [id, count] of Object.entries(specialCounts).sort((a, b) => b[1] - a[1])) {
  console.log(`  ${id.padEnd(12)} ${String(count).padStart(6)}  (${percent(count, ROUND_COUNT)}%)`);
  const drift = Math.abs(count / ROUND_COUNT - expectedShare) / expectedShare;
  check(drift <= UNIFORMITY_TOLERANCE, `special pick for ${id} drifted ${(drift * 100).toFixed(1)}% from uniform`);
}
check(Object.keys(specialCounts).length === catalogSize, 'some bodies were never picked as special');

console.log('\n=== Outcomes (random tapping) ===');
console.log(`  won   ${String(outcomes.won).padStart(6)}  (${percent(outcomes.won, ROUND_COUNT)}%)`);
console.log(`  lost  ${String(outcomes.lost).padStart(6)}  (${percent(outcomes.lost, ROUND_COUNT)}%)`);
console.log(`  avg guesses spent ${(guessesSpent / ROUND_COUNT).toFixed(2)}`);

if (failures.length > 0) {
  console.error('\nverify:rounds failed');
  failures.slice(0, 20).forEach((failure, index) => console.error(`  ${index + 1}. ${failure}`));
  process.exitCode = 1;
} else {
  console.log('\nverify:rounds passed');
}
