/** Engine validation errors. */
export enum EngineError {
  INVALID_RANGE = 'INVALID_RANGE',
  INVALID_CONCESSION = 'INVALID_CONCESSION',
  INVALID_ROUNDS = 'INVALID_ROUNDS',
  EMPTY_POPULATION = 'EMPTY_POPULATION',
  INVALID_RATE = 'INVALID_RATE',
  UNEVALUATED_POPULATION = 'UNEVALUATED_POPULATION',
  EMPTY_SWARM = 'EMPTY_SWARM',
  INVALID_THRESHOLD = 'INVALID_THRESHOLD',
  INVALID_SEED = 'INVALID_SEED',
  INVALID_FITNESS = 'INVALID_FITNESS',
}

/** Thrown when an engine is constructed or driven with inputs that can never be valid. */
export class EngineFault extends Error {
  readonly code: EngineError;

  constructor(code: EngineError, detail?: string) {
    super(detail ? `${code}: ${detail}` : code);
    this.name = 'EngineFault';
    this.code = code;
  }
}
