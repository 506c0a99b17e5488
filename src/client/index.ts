export type {
  Target,
  Column,
  ResultTable,
  QueryResponse,
  RequestOptions,
  QueryOptions,
  TargetListing,
  QueryPageSource,
  RemoteQueryService,
} from './types.js';
export { HttpQueryService, extractResourceGroup, type HttpQueryServiceConfig } from './http-service.js';
