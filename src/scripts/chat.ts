/**
 * Chat CLI Script - Ask the Database in Plain Language
 * Layer: Entry Point (CLI, not HTTP)
 *
 * npm run chat. I need the digest to have run first (the enriched schema
 * cache must exist). Then I loop: read a line, handle `schema` / `help` /
 * `exit`, otherwise send it through ChatService and print the SQL and the
 * result table, or the validator's suggestion when the SQL was rejected.
 * Errors for one question are printed and the loop carries on. Ctrl+C or
 * end of input ends the session.
 */
import 'reflect-metadata';

import readline from 'node:readline/promises';

import type { ChatService } from '@application/services/ChatService';
import { assertRequiredSettings, config } from '@core/config';
import { container } from '@core/container';
import { logger } from '@core/logger';
import { TOKENS } from '@core/types';
import type { ISchemaCache } from '@domain/interfaces/ISchemaCache';
import { destroyDbConnection } from '@infrastructure/database/connection';
import { HELP_TEXT, parseChatInput } from '@interfaces/cli/chatCommands';
import { formatOutcome, formatSchema, RULE } from '@interfaces/cli/formatters';
import { AppError, errorMessage, SqlExecutionError } from '@shared/errors/AppError';

// eslint-disable-next-line no-console
const log = console.log;

async function answer(chat: ChatService, question: string): Promise<void> {
  log('\nProcessing query...\n');
  try {
    const outcome = await chat.ask(question, { execute: true });
    log(formatOutcome(outcome, config.sql.displayRows));
  } catch (err) {
    if (err instanceof SqlExecutionError) {
      log(`Error: ${err.message}`);
      log('\nAttempted SQL Query:');
      log(RULE);
      log(err.sql);
      return;
    }
    if (!(err instanceof AppError)) logger.error({ err }, 'Unexpected error while answering');
    log(`Error: ${errorMessage(err)}`);
  }
}

async function main(): Promise<void> {
  assertRequiredSettings();

  const cache = container.resolve<ISchemaCache>(TOKENS.SchemaCache);
  if (!cache.exists()) {
    log('Schema not digested. Run `npm run digest` first.');
    process.exitCode = 1;
    return;
  }

  const chat = container.resolve<ChatService>(TOKENS.ChatService);
  const schema = await chat.getSchema();

  log('');
  log('Welcome to Database Chat!');
  log(`${Object.keys(schema.tables).length} tables digested on ${schema.metadata.generatedAt}.`);
  log("Type 'exit' to quit, 'schema' to see database structure, 'help' for commands.");
  log('='.repeat(70));

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  const closed = new AbortController();
  rl.on('close', () => closed.abort());
  rl.on('SIGINT', () => rl.close());

  try {
    while (!closed.signal.aborted) {
      let line: string;
      try {
        line = await rl.question('\nEnter your question: ', { signal: closed.signal });
      } catch (err) {
        if (closed.signal.aborted) break;
        throw err;
      }

      const command = parseChatInput(line);
      if (command.kind === 'empty') continue;
      if (command.kind === 'exit') break;
      if (command.kind === 'help') log(HELP_TEXT);
      else if (command.kind === 'schema') log(formatSchema(schema));
      else await answer(chat, command.question);
    }
  } finally {
    rl.close();
    log('\nGoodbye!');
    await destroyDbConnection();
  }
}

main().catch(async (err: unknown) => {
  if (!(err instanceof AppError)) logger.error({ err }, 'Chat failed');
  // eslint-disable-next-line no-console
  console.error(`Error: ${errorMessage(err)}`);
  await destroyDbConnection();
  process.exit(1);
});
