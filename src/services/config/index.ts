export { loadInstallerConfig } from "./config-service";
export type { InstallerConfig } from "./types";
export { DEFAULT_ESP_IDF_REPOSITORY, DEFAULT_TOOLS_DIR_NAME } from "./types";
