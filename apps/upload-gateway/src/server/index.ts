export { buildServer, FILE_ERROR_MAPPINGS } from "./build-server"
export { run } from "./run"
