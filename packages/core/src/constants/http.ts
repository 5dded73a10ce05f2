// HEADERS //

/** header carrying the bearer credential */
export const AUTHORIZATION_HEADER = 'Authorization';
/** scheme prefix of a bearer authorization header value */
export const BEARER_PREFIX = 'Bearer ';
