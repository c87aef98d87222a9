/**
 * Query Controller - HTTP Boundary for Questions
 * Layer: Interfaces (HTTP)
 *
 * I keep this thin: take the validated body, hand the question to
 * ChatService, shape the outcome as JSON. A rejected candidate is answered
 * with 422 and the validator's suggestion as the message; everything else
 * the service throws goes to the global error handler.
 */
import type { ChatService } from '@application/services/ChatService';
import { container } from '@core/container';
import { TOKENS } from '@core/types';
import { elapsedMs } from '@interfaces/http/middleware/requestTimer';
import type { AskBody } from '@shared/schemas';
import type { Request, Response } from 'express';

export class QueryController {
  private service: ChatService;

  constructor() {
    this.service = container.resolve<ChatService>(TOKENS.ChatService);
  }

  ask = async (req: Request, res: Response): Promise<void> => {
    const body: AskBody = req.body;
    const outcome = await this.service.ask(body.question, { execute: body.execute });
    const totalTimeMs = elapsedMs(req);

    if (outcome.status === 'rejected') {
      res.status(422).json({
        status: 'rejected',
        message: outcome.validation.suggestion,
        data: { sql: outcome.candidate.sql, validation: outcome.validation },
      });
      return;
    }

    res.status(200).json({
      status: 'success',
      data: {
        outcome: outcome.status,
        sql: outcome.candidate.sql,
        tables: outcome.candidate.tables,
        confidence: outcome.candidate.confidence,
        ...(outcome.status === 'executed' && { result: outcome.result }),
      },
      ...(totalTimeMs != null && { meta: { totalTimeMs } }),
    });
  };
}
