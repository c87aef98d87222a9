/** Name of the enriched-schema file inside SCHEMA_CACHE_DIR. */
export const ENRICHED_SCHEMA_FILE = 'enriched_schema.json';

/** Inputs per embeddings request during the digest. */
export const EMBEDDING_BATCH_SIZE = 100;

/** Distinct example values kept per column when sampling is on. */
export const MAX_SAMPLE_VALUES_PER_COLUMN = 5;
export const MAX_SAMPLE_VALUE_LENGTH = 50;

/** CLI result table: widest cell before truncation. */
export const MAX_CELL_WIDTH = 40;

export const MAX_QUESTION_LENGTH = 2000;

/** Known tables listed in a validation suggestion. */
export const SUGGESTED_TABLES_LIMIT = 10;

export const DEFAULT_IGNORE_FILE_CONTENT = `# Tables to exclude from natural language SQL processing
# Each line is a glob pattern matched (case-insensitively) against table names
# Examples:
# temp_*          # Ignore all tables starting with temp_
# *_backup        # Ignore all tables ending with _backup
# test_table      # Ignore a specific table
# *_log*          # Ignore any table containing _log
#
# Everything after # on a line is a comment
`;
