export type { IRateProvider } from './rate-provider.interface.js';
export type {
  IHttpClient,
  HttpRequestOptions,
  HttpResponse,
} from './http-client.interface.js';
