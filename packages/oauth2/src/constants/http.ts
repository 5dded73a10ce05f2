// HTTP STATUS CODES //

/** HTTP 200 OK status code */
export const HTTP_STATUS_OK = 200;
/** HTTP 400 Bad Request status code, the lowest client error */
export const HTTP_STATUS_BAD_REQUEST = 400;
/** HTTP 404 Not Found status code */
export const HTTP_STATUS_NOT_FOUND = 404;
/** HTTP 500 Internal Server Error status code, the lowest server error */
export const HTTP_STATUS_SERVER_ERROR = 500;

// HEADERS //

/** header identifying requests to, and responses from, the metadata server */
export const METADATA_FLAVOR_HEADER = 'Metadata-Flavor';
/** value of the metadata flavor header */
export const METADATA_FLAVOR_VALUE = 'Google';
/** header attributing api usage to a quota project */
export const QUOTA_PROJECT_HEADER = 'x-goog-user-project';

// CONTENT TYPES //

/** content type of url-encoded form bodies */
export const CONTENT_TYPE_FORM = 'application/x-www-form-urlencoded';
/** content type of json bodies */
export const CONTENT_TYPE_JSON = 'application/json';
