import { HttpException, HttpStatus } from '@nestjs/common';
import { Response } from 'express';
import { OperationCancelledError } from '../common/abort';
import { ProviderError, ProviderErrorKind, ProviderKind } from '../common/provider-error';
import { DebateSession, DebateTurnResponse } from '../domain/types';
import { SessionTurnResult } from './debate-sessions.service';
import { DebateFinishedError, DebateNotFoundError, DebateValidationError } from './debate.errors';

/** Text arrived but audio did not. */
export const PARTIAL_TURN_STATUS = 207;
export const CLIENT_CLOSED_REQUEST = 499;

export interface TurnPayload {
  responseText: string;
  audioUrl: string | null;
  partial: boolean;
  durationSeconds?: number;
}

export interface SessionTurnPayload extends TurnPayload {
  debateId: string;
  finished: boolean;
  winner?: string;
}

export interface ErrorPayload {
  error: { code: string; message: string };
}

export function toTurnPayload(turn: DebateTurnResponse): TurnPayload {
  const payload: TurnPayload = {
    responseText: turn.responseText,
    audioUrl: turn.audio ? turn.audio.audioUrl : null,
    partial: turn.partial,
  };
  if (turn.audio?.durationSeconds !== undefined) {
    payload.durationSeconds = turn.audio.durationSeconds;
  }
  return payload;
}

export function toSessionTurnPayload(result: SessionTurnResult): SessionTurnPayload {
  const payload: SessionTurnPayload = {
    debateId: result.debateId,
    ...toTurnPayload(result.turn),
    finished: result.finished,
  };
  if (result.winner !== undefined) {
    payload.winner = result.winner;
  }
  return payload;
}

export function toSessionView(session: DebateSession) {
  return {
    debateId: session.id,
    char1: session.char1,
    char2: session.char2,
    userCharacter: session.userCharacter,
    aiCharacter: session.aiCharacter,
    startedAt: session.startedAt.toISOString(),
    turnCount: session.turnCount,
    finished: session.finished,
    winner: session.winner ?? null,
    history: session.history.map((entry) => ({ speaker: entry.speaker, text: entry.text })),
  };
}

export function turnStatus(turn: DebateTurnResponse, success: HttpStatus = HttpStatus.OK): number {
  return turn.partial ? PARTIAL_TURN_STATUS : success;
}

/** Aborts once the client goes away before the response has been written. */
export function abortOnDisconnect(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableFinished) {
      controller.abort();
    }
  });
  return controller.signal;
}

const PROVIDER_LABELS: Record<ProviderKind, string> = {
  'text-generation': 'Text generation',
  'speech-synthesis': 'Speech synthesis',
};

const PROVIDER_FAILURES: Record<ProviderErrorKind, { status: number; code: string; describe: (label: string) => string }> =
  {
    timeout: {
      status: HttpStatus.GATEWAY_TIMEOUT,
      code: 'PROVIDER_TIMEOUT',
      describe: (label) => `${label} provider timed out`,
    },
    auth_failure: {
      status: HttpStatus.BAD_GATEWAY,
      code: 'PROVIDER_AUTH_FAILURE',
      describe: (label) => `${label} provider rejected the configured credentials`,
    },
    rate_limited: {
      status: HttpStatus.SERVICE_UNAVAILABLE,
      code: 'PROVIDER_RATE_LIMITED',
      describe: (label) => `${label} provider is rate limiting requests; try again shortly`,
    },
    upstream: {
      status: HttpStatus.BAD_GATEWAY,
      code: 'PROVIDER_UPSTREAM_ERROR',
      describe: (label) => `${label} provider returned an error`,
    },
    unknown: {
      status: HttpStatus.BAD_GATEWAY,
      code: 'PROVIDER_ERROR',
      describe: (label) => `${label} provider failed unexpectedly`,
    },
  };

function errorBody(code: string, message: string): ErrorPayload {
  return { error: { code, message } };
}

export function toHttpException(error: unknown): HttpException {
  if (error instanceof HttpException) {
    return error;
  }
  if (error instanceof DebateValidationError) {
    return new HttpException(errorBody('VALIDATION_ERROR', error.message), HttpStatus.BAD_REQUEST);
  }
  if (error instanceof DebateNotFoundError) {
    return new HttpException(errorBody('DEBATE_NOT_FOUND', error.message), HttpStatus.NOT_FOUND);
  }
  if (error instanceof DebateFinishedError) {
    return new HttpException(errorBody('DEBATE_FINISHED', error.message), HttpStatus.CONFLICT);
  }
  if (error instanceof OperationCancelledError) {
    return new HttpException(errorBody('REQUEST_CANCELLED', error.message), CLIENT_CLOSED_REQUEST);
  }
  if (error instanceof ProviderError) {
    const failure = PROVIDER_FAILURES[error.kind];
    return new HttpException(
      errorBody(failure.code, failure.describe(PROVIDER_LABELS[error.provider])),
      failure.status,
      { cause: error },
    );
  }
  return new HttpException(errorBody('INTERNAL_ERROR', 'Internal server error'), HttpStatus.INTERNAL_SERVER_ERROR, {
    cause: error,
  });
}
