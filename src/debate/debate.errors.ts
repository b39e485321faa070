export class DebateValidationError extends Error {
  override readonly name = 'DebateValidationError';
}

export class DebateNotFoundError extends Error {
  override readonly name = 'DebateNotFoundError';

  constructor(readonly debateId: string) {
    super(`Debate ${debateId} not found`);
  }
}

export class DebateFinishedError extends Error {
  override readonly name = 'DebateFinishedError';

  constructor(readonly debateId: string) {
    super(`Debate ${debateId} has already finished`);
  }
}
