export { createFilesModule } from "./api"
export { createFileServices, type FileServices } from "./composition"
