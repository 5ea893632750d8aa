export { provisionWorkspace, MEMORY_HEADING } from "./provision";
export { SqliteBurrowStore, type SqliteBurrowStoreConfig, type CompleteTaskInput } from "./sqliteBurrowStore";
