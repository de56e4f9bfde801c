export { GraphClient, GRAPH_ENDPOINT, GRAPH_BETA_ENDPOINT, GRAPH_CLIENT_DEFAULTS, extractPage } from "./client.js";
export type {
  BatchRequest,
  BatchResult,
  FetchLike,
  GraphApi,
  GraphClientOptions,
  Page,
  PagedResult,
  PaginationOptions,
  QueryParams,
  RequestOptions,
} from "./types.js";
