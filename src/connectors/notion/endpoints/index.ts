export { BaseEndpoint, compact } from "./base.js";
export type { BlockTreeNode } from "./blocks.js";
export { BlocksEndpoint, DEFAULT_TREE_DEPTH, parseBlock } from "./blocks.js";
export type {
  CreateDatabaseParams,
  DatabaseQueryParams,
  UpdateDatabaseParams,
} from "./databases.js";
export { DatabasesEndpoint, parseDatabase } from "./databases.js";
export type { CreatePageParams, PageTemplate, UpdatePageParams } from "./pages.js";
export { PagesEndpoint, parsePage } from "./pages.js";
export type {
  SearchByTitleOptions,
  SearchObjectType,
  SearchParams,
  SearchResult,
} from "./search.js";
export { objectFilter, parseSearchResult, resultTitle, SearchEndpoint } from "./search.js";
export { parseUser, UsersEndpoint } from "./users.js";
