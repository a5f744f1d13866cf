/**
 * @fileoverview Detailed help text for entity-resolver CLI commands
 */

const HELP_TEXT: Record<string, string> = {
  main: `
entity-resolver - Map natural-language query fragments to known business entities

USAGE:
    entity-resolver <command> [options]

COMMANDS:
    resolve <query>     Resolve the entities mentioned in a query
    sync <file>         Index entity snapshots from a JSON file
    delete <canonical>  Remove every record of an entity
    stats               Show index statistics
    inspect             Show a sample of indexed records
    help [command]      Show help for a command

GLOBAL OPTIONS:
    -h, --help          Show help information
    -v, --version       Show version information
    --config <path>     YAML configuration file (default: $ENTITY_RESOLVER_CONFIG)
    --json              Output results and errors as JSON

ENVIRONMENT:
    ENTITY_RESOLVER_DB_PATH          SQLite database path
    ENTITY_RESOLVER_LOG_LEVEL        debug | info | warn | error | silent
    ENTITY_RESOLVER_MODEL            Embedding model id
    ENTITY_RESOLVER_MAX_DISTANCE     Maximum cosine distance for a match
    ENTITY_RESOLVER_BUSINESS_DOMAIN  Default vocabulary domain

EXIT CODES:
    1 internal, 2 invalid argument, 3 validation, 10 storage,
    20 query, 21 timeout, 30 embedding, 40 sync, 41 delete

EXAMPLES:
    entity-resolver sync entities.json
    entity-resolver resolve "most sold product in orders" --groups Sales
    entity-resolver delete Customer
    entity-resolver stats --json

For more information on a specific command, run:
    entity-resolver help <command>
`,

  resolve: `
entity-resolver resolve - Resolve the entities mentioned in a query

USAGE:
    entity-resolver resolve "<query>" --groups <g1,g2> [options]

OPTIONS:
    --groups <list>     Comma-separated entity groups to search (required)
    --domain <name>     Vocabulary domain for term expansion (default: general)
    --debug             Include the candidate trace in the output
    --json              Output the full resolution result as JSON

DESCRIPTION:
    Splits the query into phrase, word and vocabulary-expanded candidates,
    searches the entity index within the given groups and reports the best
    entity for each candidate that clears the confidence floor.

EXAMPLES:
    entity-resolver resolve "list client invoices" --groups CRM,Finance
    entity-resolver resolve "most sold product" --groups Sales --domain retail --json
`,

  sync: `
entity-resolver sync - Index entity snapshots from a JSON file

USAGE:
    entity-resolver sync <file.json> [--json]

DESCRIPTION:
    The file holds one snapshot or an array of snapshots:
    {
      "canonicalName": "Customer",
      "aliases": "client, account",
      "groups": ["CRM"],
      "recordType": "Customer",
      "relatedRecordTypes": ["Sales Order", "Sales Invoice"]
    }
    Every alias is embedded and stored once per group. Re-syncing an entity
    replaces its records, so running sync twice is harmless.

EXAMPLES:
    entity-resolver sync fixtures/entities.json
`,

  delete: `
entity-resolver delete - Remove every record of an entity

USAGE:
    entity-resolver delete <canonical name> [--json]

EXAMPLES:
    entity-resolver delete "Sales Order"
`,

  stats: `
entity-resolver stats - Show index statistics

USAGE:
    entity-resolver stats [--json]

DESCRIPTION:
    Reports the record count, vector dimension, per-group record counts and
    whether approximate (HNSW) search is active.
`,

  inspect: `
entity-resolver inspect - Show a sample of indexed records

USAGE:
    entity-resolver inspect [--limit <n>] [--json]

OPTIONS:
    --limit <n>         Number of records to show (default: 5)
`,
};

export function getCommandHelp(command?: string): string {
  const main = HELP_TEXT.main ?? '';
  if (command === undefined) return main;
  if (!Object.hasOwn(HELP_TEXT, command)) return `Unknown command: ${command}\n${main}`;
  return HELP_TEXT[command] ?? main;
}
