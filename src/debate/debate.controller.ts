import { Body, Controller, Get, HttpException, HttpStatus, Logger, Param, Post, Res } from '@nestjs/common';
import { Response } from 'express';
import { DebateOrchestratorService } from './debate-orchestrator.service';
import {
  abortOnDisconnect,
  toHttpException,
  toSessionTurnPayload,
  toSessionView,
  toTurnPayload,
  turnStatus,
} from './debate-http';
import { createDebateTurnRequest, parseSessionTurnBody, parseStartBody, parseTurnBody } from './debate-request';
import { DebateSessionsService } from './debate-sessions.service';

@Controller()
export class DebateController {
  private readonly logger = new Logger(DebateController.name);

  constructor(
    private readonly orchestrator: DebateOrchestratorService,
    private readonly sessionsService: DebateSessionsService,
  ) {}

  @Post('debate/turn')
  async produceTurn(@Body() body: unknown, @Res() res: Response): Promise<void> {
    const signal = abortOnDisconnect(res);
    const turn = await this.guard('debate/turn', () =>
      this.orchestrator.produceTurn(createDebateTurnRequest(parseTurnBody(body)), { signal }),
    );
    res.status(turnStatus(turn)).json(toTurnPayload(turn));
  }

  @Post('debates')
  async startDebate(@Body() body: unknown, @Res() res: Response): Promise<void> {
    const signal = abortOnDisconnect(res);
    const result = await this.guard('debates', () => this.sessionsService.startDebate(parseStartBody(body), { signal }));
    res.status(turnStatus(result.turn, HttpStatus.CREATED)).json(toSessionTurnPayload(result));
  }

  @Post('debates/:id/turns')
  async takeTurn(@Param('id') id: string, @Body() body: unknown, @Res() res: Response): Promise<void> {
    const signal = abortOnDisconnect(res);
    const result = await this.guard(`debates/${id}/turns`, () =>
      this.sessionsService.takeTurn(id, parseSessionTurnBody(body), { signal }),
    );
    res.status(turnStatus(result.turn)).json(toSessionTurnPayload(result));
  }

  @Get('debates/:id')
  async getDebate(@Param('id') id: string) {
    const session = await this.guard(`debates/${id}`, () => this.sessionsService.getDebate(id));
    return toSessionView(session);
  }

  private async guard<T>(route: string, action: () => Promise<T>): Promise<T> {
    try {
      return await action();
    } catch (error) {
      const exception = toHttpException(error);
      this.logFailure(route, exception, error);
      throw exception;
    }
  }

  private logFailure(route: string, exception: HttpException, error: unknown): void {
    const status = exception.getStatus();
    const message = error instanceof Error ? error.message : String(error);
    if (status >= 500) {
      this.logger.error(`${route} failed with ${status}: ${message}`, error instanceof Error ? error.stack : undefined);
    } else {
      this.logger.warn(`${route} rejected with ${status}: ${message}`);
    }
  }
}
