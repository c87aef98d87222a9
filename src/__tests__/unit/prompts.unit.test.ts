import { buildConfidencePrompt, parseConfidence } from '@application/prompts/confidence.prompt';
import { buildSqlGenerationPrompt, formatSchemaContext } from '@application/prompts/sqlGeneration.prompt';
import { formatTableForDescription } from '@application/prompts/tableDescription.prompt';
import { buildTableSelectionPrompt, parseTableSelection } from '@application/prompts/tableSelection.prompt';

import { ordersTable, relevantTable } from '../helpers/fixtures';

describe('formatTableForDescription', () => {
  it('should list columns with their attributes and the relationships', () => {
    expect(formatTableForDescription('orders', ordersTable)).toBe(
      [
        'Table: orders',
        'Columns:',
        '- id (integer) NOT NULL PRIMARY KEY',
        '- customer_id (integer) NOT NULL',
        '- total (numeric(10,2))',
        '- placed_at (timestamp with time zone) NOT NULL DEFAULT now()',
        '',
        'Relationships:',
        '- customer_id references customers (id)',
      ].join('\n'),
    );
  });
});

describe('table selection prompt', () => {
  it('should list quoted names with four-decimal scores', () => {
    const [, user] = buildTableSelectionPrompt('Top products?', [relevantTable('Products', 0.87654)]);

    expect(user.content).toContain('Question: Top products?');
    expect(user.content).toContain(
      'Table: "Products"\nRelevance Score: 0.8765\nDescription: Product catalog with titles and prices.',
    );
  });

  it('should parse comma and newline separated answers', () => {
    expect(parseTableSelection('orders, "Products"\n`customers`')).toEqual(['orders', 'Products', 'customers']);
    expect(parseTableSelection(' , \n')).toEqual([]);
  });
});

describe('SQL generation prompt', () => {
  it('should render the schema context with quoted names and foreign keys', () => {
    expect(formatSchemaContext([relevantTable('orders'), relevantTable('Products')])).toBe(
      [
        'Table: orders',
        'Description: Orders placed by customers with their totals.',
        'Columns:',
        '- id (integer) NOT NULL PRIMARY KEY',
        '- customer_id (integer) NOT NULL',
        '- total (numeric(10,2))',
        '- placed_at (timestamp with time zone) NOT NULL',
        'Foreign Keys:',
        '- customer_id -> customers(id)',
        '',
        'Table: "Products"',
        'Description: Product catalog with titles and prices.',
        'Columns:',
        '- id (integer) NOT NULL PRIMARY KEY',
        '- title (text) NOT NULL',
        '- price (numeric(8,2))',
      ].join('\n'),
    );
  });

  it('should send the question as the user message', () => {
    const messages = buildSqlGenerationPrompt('How many orders?', [relevantTable('orders')]);

    expect(messages).toHaveLength(2);
    expect(messages[0].role).toBe('system');
    expect(messages[0].content).toContain('Use the exact table names as shown above.');
    expect(messages[1]).toEqual({ role: 'user', content: 'How many orders?' });
  });
});

describe('confidence prompt', () => {
  it('should include the question, the SQL and the available tables', () => {
    const [, user] = buildConfidencePrompt('SELECT 1', 'Anything?', [relevantTable('Products')]);

    expect(user.content).toBe('Original question: Anything?\nGenerated SQL: SELECT 1\n\nAvailable tables:\n- "Products"');
  });

  it('should parse the first number and clamp it to [0, 1]', () => {
    expect(parseConfidence('0.9')).toBe(0.9);
    expect(parseConfidence('Score: 0.75/1')).toBe(0.75);
    expect(parseConfidence('.5')).toBe(0.5);
    expect(parseConfidence('1.7')).toBe(1);
    expect(parseConfidence('-0.3')).toBe(0);
    expect(parseConfidence('high')).toBe(0);
  });
});
