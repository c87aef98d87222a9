/**
 * Schema Controller
 * Layer: Interfaces (HTTP)
 *
 * Lists the digested tables the way the CLI's `schema` command shows them:
 * description, columns and foreign keys. 409 until the digest has run.
 */
import type { ChatService } from '@application/services/ChatService';
import { container } from '@core/container';
import { TOKENS } from '@core/types';
import type { Request, Response } from 'express';

export class SchemaController {
  private service: ChatService;

  constructor() {
    this.service = container.resolve<ChatService>(TOKENS.ChatService);
  }

  list = async (_req: Request, res: Response): Promise<void> => {
    const schema = await this.service.getSchema();

    const data = Object.entries(schema.tables).map(([name, table]) => ({
      name,
      description: table.description,
      columns: Object.entries(table.schema.columns).map(([columnName, column]) => ({
        name: columnName,
        ...column,
      })),
      foreignKeys: table.schema.foreignKeys,
    }));

    res.status(200).json({
      status: 'success',
      data,
      meta: { generatedAt: schema.metadata.generatedAt, tableCount: data.length },
    });
  };
}
