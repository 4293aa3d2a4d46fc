/**
 * applink-doctor — Trust file (assetlinks.json) fetching and validation.
 */

export { AssetLinksValidator, assetLinksUrl, DEFAULT_VALIDATOR_OPTIONS } from './validate.js';
export type { ValidatorOptions, ValidateOptions, ValidationExpectation } from './validate.js';
export { parseAssetLinks, type AssetLinksParseResult } from './parse.js';
export { FetchHttpClient, classifyFetchError } from './fetcher.js';
export type { HttpFetcher, HttpResponse, HttpFailure, HttpFailureKind, HttpGetOptions } from './fetcher.js';
