/**
 * API Module
 * CityBus token scraping and REST client
 */

// Bearer token (scraped from the web front-end)
export { PageTokenResolver, extractToken, TOKEN_PATTERN } from './credentials';
export type { CredentialResolver, PageTokenResolverOptions } from './credentials';

// REST API (schedule, live, stop directory)
export { TransitApiClient, toDepartureMinutes } from './citybus';
export type { TransitApiClientOptions } from './citybus';

export {
    TransitApiError,
    CredentialFetchError,
    TokenNotFoundError,
    NetworkError,
    HttpStatusError,
    PayloadError,
    InvalidQueryError,
} from './errors';
