// OAUTH2 SERVER //

/** default oauth2 token endpoint */
export const TOKEN_SERVER_URL = 'https://oauth2.googleapis.com/token';
/** default oauth2 authorization endpoint for user consent */
export const AUTHORIZATION_SERVER_URL =
  'https://accounts.google.com/o/oauth2/auth';
/** default endpoint for revoking user tokens */
export const TOKEN_REVOKE_URL = 'https://oauth2.googleapis.com/revoke';

// IAM //

/** base of the iam credentials api for service accounts */
export const IAM_SERVICE_ACCOUNTS_URL =
  'https://iamcredentials.googleapis.com/v1/projects/-/serviceAccounts';

/**
 * builds the generateAccessToken endpoint for a service account
 * @param account email of the service account
 * @returns endpoint url
 */
export function generateAccessTokenUrl(account: string): string {
  return `${IAM_SERVICE_ACCOUNTS_URL}/${account}:generateAccessToken`;
}

/**
 * builds the signBlob endpoint for a service account
 * @param account email of the service account
 * @returns endpoint url
 */
export function signBlobUrl(account: string): string {
  return `${IAM_SERVICE_ACCOUNTS_URL}/${account}:signBlob`;
}

// METADATA SERVER //

/** default address of the compute engine metadata server */
export const DEFAULT_METADATA_HOST = '169.254.169.254';
/** path of the default service account token on the metadata server */
export const METADATA_TOKEN_PATH =
  '/computeMetadata/v1/instance/service-accounts/default/token';

// SCOPES //

/** scope granting access to every cloud api the principal may use */
export const CLOUD_PLATFORM_SCOPE =
  'https://www.googleapis.com/auth/cloud-platform';

// GRANT AND TOKEN TYPES //

/** grant type of a signed jwt assertion exchange */
export const JWT_BEARER_GRANT = 'urn:ietf:params:oauth:grant-type:jwt-bearer';
/** grant type of an rfc 8693 token exchange */
export const TOKEN_EXCHANGE_GRANT =
  'urn:ietf:params:oauth:grant-type:token-exchange';
/** token type identifier of an oauth2 access token */
export const ACCESS_TOKEN_TYPE = 'urn:ietf:params:oauth:token-type:access_token';
