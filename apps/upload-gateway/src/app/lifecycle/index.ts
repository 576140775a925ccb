export { createStartHooks } from "./start"
export { createStopHooks } from "./stop"
