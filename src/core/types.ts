/**
 * Dependency Injection Tokens
 * Layer: Core
 *
 * Every injectable dependency is looked up in the tsyringe container by one
 * of these symbols. They are grouped by architectural layer so it is easy to
 * see what exists at each level; a new port or service gets its token here
 * first, then a registration in container.ts.
 */
export const TOKENS = {
  // Infrastructure - low-level tools and external clients
  Config: Symbol.for('Config'),
  Logger: Symbol.for('Logger'),
  Knex: Symbol.for('Knex'),
  OpenAI: Symbol.for('OpenAI'),
  Qdrant: Symbol.for('Qdrant'),

  // Ports - contracts implemented by infrastructure adapters
  SchemaIntrospector: Symbol.for('SchemaIntrospector'),
  LanguageModel: Symbol.for('LanguageModel'),
  VectorStore: Symbol.for('VectorStore'),
  SchemaCache: Symbol.for('SchemaCache'),
  QueryExecutor: Symbol.for('QueryExecutor'),
  TableIgnoreList: Symbol.for('TableIgnoreList'),

  // Services - application-level orchestrators
  SchemaEnrichmentService: Symbol.for('SchemaEnrichmentService'),
  SchemaIndexService: Symbol.for('SchemaIndexService'),
  SchemaDigestService: Symbol.for('SchemaDigestService'),
  ChatService: Symbol.for('ChatService'),

  // Engines - swappable SQL generators
  TextToSqlEngine: Symbol.for('TextToSqlEngine'),
} as const;
