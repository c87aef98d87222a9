import { tokenizeSql } from '@application/sql/sqlTokenizer';

function kindsAndValues(sql: string): [string, string][] {
  return tokenizeSql(sql).tokens.map((token) => [token.kind, token.value]);
}

describe('tokenizeSql', () => {
  it('should skip comments and unescape string literals', () => {
    expect(kindsAndValues("SELECT name FROM users WHERE note = 'it''s -- fine' -- trailing\n;")).toEqual([
      ['word', 'SELECT'],
      ['word', 'name'],
      ['word', 'FROM'],
      ['word', 'users'],
      ['word', 'WHERE'],
      ['word', 'note'],
      ['operator', '='],
      ['string', "it's -- fine"],
      ['punct', ';'],
    ]);
  });

  it('should read quoted identifiers as one token', () => {
    expect(kindsAndValues('SELECT "Order Items".id FROM "Order Items"')).toEqual([
      ['word', 'SELECT'],
      ['quoted', 'Order Items'],
      ['punct', '.'],
      ['word', 'id'],
      ['word', 'FROM'],
      ['quoted', 'Order Items'],
    ]);
  });

  it('should treat dollar-quoted bodies as strings', () => {
    expect(kindsAndValues('SELECT $$a;b$$, $tag$x$tag$')).toEqual([
      ['word', 'SELECT'],
      ['string', 'a;b'],
      ['punct', ','],
      ['string', 'x'],
    ]);
  });

  it('should read numbers and upper-case words', () => {
    const { tokens } = tokenizeSql('select 1 LIMIT 10');

    expect(tokens[0].upper).toBe('SELECT');
    expect(tokens[1]).toEqual({ kind: 'number', value: '1', upper: '' });
    expect(tokens[3].value).toBe('10');
  });

  it('should report unterminated literals, identifiers and comments', () => {
    expect(tokenizeSql("SELECT 'abc").unterminated).toBe('string');
    expect(tokenizeSql('SELECT "abc').unterminated).toBe('identifier');
    expect(tokenizeSql('SELECT 1 /* open').unterminated).toBe('comment');
    expect(tokenizeSql('SELECT 1').unterminated).toBeNull();
  });

  it('should keep the tokens read before an unterminated literal', () => {
    expect(tokenizeSql("SELECT 'abc").tokens.map((token) => token.value)).toEqual(['SELECT']);
  });
});
