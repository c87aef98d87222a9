/** Input handling of the chat loop: built-in commands versus questions. */
export type ChatCommand =
  | { kind: 'empty' }
  | { kind: 'exit' }
  | { kind: 'help' }
  | { kind: 'schema' }
  | { kind: 'question'; question: string };

export const HELP_TEXT = [
  'Commands:',
  '  schema        show the digested tables',
  '  help          show this help',
  '  exit, quit    leave the chat',
  'Anything else is sent as a question, e.g. "How many orders were placed last month?"',
].join('\n');

export function parseChatInput(line: string): ChatCommand {
  const input = line.trim();
  if (input.length === 0) return { kind: 'empty' };

  switch (input.toLowerCase()) {
    case 'exit':
    case 'quit':
      return { kind: 'exit' };
    case 'help':
      return { kind: 'help' };
    case 'schema':
      return { kind: 'schema' };
    default:
      return { kind: 'question', question: input };
  }
}
