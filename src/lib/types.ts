export type BodyId = string;

export type BodyKind = 'orbiting' | 'stationary';

export type RoundStatus = 'in_progress' | 'won' | 'lost';

export interface Point {
  x: number;
  y: number;
}

interface BodyBase {
  id: BodyId;
  name: string;
  color: string;
  radius: number;
}

export interface OrbitingBody extends BodyBase {
  kind: 'orbiting';
  orbitRadius: number;
  orbitSpeed: number;
}

export interface StationaryBody extends BodyBase {
  kind: 'stationary';
  shape: 'sun' | 'star';
  position: Point;
}

export type Body = OrbitingBody | StationaryBody;

export type OrbitingTemplate = Omit<OrbitingBody, 'id'> & { id?: BodyId };

// Stationary templates without a position sit at the field centre.
export type StationaryTemplate = Omit<StationaryBody, 'id' | 'position'> & { id?: BodyId; position?: Point };

export type BodyTemplate = OrbitingTemplate | StationaryTemplate;

export interface FieldSettings {
  size: number;
  starMargin: number;
}

export interface GameConfig {
  bodies: readonly BodyTemplate[];
  starCount: number;
  starColors: readonly string[];
  guessBudget: number;
  field: FieldSettings;
}

export interface Round {
  bodies: readonly Body[];
  specialId: BodyId;
  guessBudget: number;
  remainingGuesses: number;
  guessed: readonly BodyId[];
  status: RoundStatus;
}

export type GuessRejection = 'unknown_body' | 'round_over';

export type GuessResult =
  | { outcome: 'continue' | 'won' | 'lost'; round: Round }
  | { outcome: 'rejected'; reason: GuessRejection; round: Round };
