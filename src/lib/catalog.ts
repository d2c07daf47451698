import { pickOne, randomInRange, type RandomSource } from './rng';
import type { Body, BodyTemplate, GameConfig } from './types';

export const SOLAR_BODIES: readonly BodyTemplate[] = [
  { name: 'Mercury', kind: 'orbiting', color: '#8e8e93', radius: 5, orbitRadius: 25, orbitSpeed: 3 },
  { name: 'Venus', kind: 'orbiting', color: '#f0e68c', radius: 8, orbitRadius: 40, orbitSpeed: 7 },
  { name: 'Earth', kind: 'orbiting', color: '#0a84ff', radius: 10, orbitRadius: 55, orbitSpeed: 10 },
  { name: 'Mars', kind: 'orbiting', color: '#ff453a', radius: 7, orbitRadius: 70, orbitSpeed: 15 },
  { name: 'Jupiter', kind: 'orbiting', color: '#e3964f', radius: 15, orbitRadius: 100, orbitSpeed: 20 },
  { name: 'Saturn', kind: 'orbiting', color: '#ffd700', radius: 12, orbitRadius: 125, orbitSpeed: 25 },
  { name: 'Uranus', kind: 'orbiting', color: '#add8e6', radius: 10, orbitRadius: 150, orbitSpeed: 30 },
  { name: 'Neptune', kind: 'orbiting', color: '#4069e0', radius: 10, orbitRadius: 175, orbitSpeed: 35 },
  { name: 'Sun', kind: 'stationary', shape: 'sun', color: '#ffd700', radius: 25 }
];

export const STAR_COLORS: readonly string[] = ['#ffffff', '#8e8e93', '#0a84ff', '#ffd60a'];
export const STAR_RADIUS = 4;

export const slugifyName = (name: string) =>
  name
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');

export function buildCatalog(config: GameConfig, random: RandomSource): Body[] {
  const { size, starMargin } = config.field;
  const center = { x: size / 2, y: size / 2 };

  const fixed = config.bodies.map((template): Body => {
    const id = template.id ?? slugifyName(template.name);
    if (template.kind === 'orbiting') return { ...template, id };
    return { ...template, id, position: template.position ?? center };
  });

  const stars = Array.from({ length: config.starCount }, (_, i): Body => ({
    id: `star-${i + 1}`,
    name: `Star ${i + 1}`,
    kind: 'stationary',
    shape: 'star',
    color: config.starColors.length > 0 ? pickOne(random, config.starColors) : '#ffffff',
    radius: STAR_RADIUS,
    position: {
      x: randomInRange(random, starMargin, size - starMargin),
      y: randomInRange(random, starMargin, size - starMargin)
    }
  }));

  const bodies = [...fixed, ...stars];
  const seen = new Set<string>();
  for (const body of bodies) {
    if (seen.has(body.id)) throw new Error(`Duplicate body id "${body.id}" in catalog`);
    seen.add(body.id);
  }
  return bodies;
}
