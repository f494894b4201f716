export { DockerComposeRuntime, parsePsOutput, tagOfImage } from './docker-compose-runtime.js';
export type { DockerComposeOptions } from './docker-compose-runtime.js';
export { ComposePostgresDumper, DUMP_TRAILER, quoteIdent } from './compose-postgres-dumper.js';
export type { ComposePostgresOptions } from './compose-postgres-dumper.js';
