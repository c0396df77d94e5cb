export { nanoid } from "./adapters/nanoid"
export { prefixed } from "./adapters/prefixed"
export { uuidV7 } from "./adapters/uuid"
export type { IdGenerator } from "./ports/id-generator"
