export type { EnvAssignment, EnvFileFormat } from "./env-file";
export { envFileFormat, formatAssignment, formatEnvFile } from "./env-file";
export { EnvExportWriter } from "./env-export-writer";
