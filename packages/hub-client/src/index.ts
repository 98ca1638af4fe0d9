/**
 * @model-bootstrap/hub-client - Model hub client package
 */

export { BaseApiClient } from './base-client.js';
export type { BaseApiClientConfig } from './base-client.js';
export { HubClient, DEFAULT_REVISION } from './hub-client.js';
export type {
  HubClientConfig,
  ModelHub,
  WhoAmI,
  DownloadOptions,
  DownloadProgress,
} from './hub-client.js';
export {
  cachePathFor,
  findCachedFile,
  repoFolderName,
  isFile,
  INCOMPLETE_SUFFIX,
} from './cache.js';
export { toHubError } from './errors.js';
