// Named failure conditions raised by the engine

// Bad input rejected before it reaches the knowledge engine
export class InvalidInput extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidInput';
  }
}

export class InvalidPlayerCount extends InvalidInput {
  readonly numPlayers: number;
  constructor(numPlayers: number, min: number, max: number) {
    super(`Player count ${numPlayers} is outside [${min}, ${max}]`);
    this.name = 'InvalidPlayerCount';
    this.numPlayers = numPlayers;
  }
}

// Facts that cannot all hold. Always an engine or caller defect; never caught by the engine.
export class Contradiction extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'Contradiction';
  }
}
