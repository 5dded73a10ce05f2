export type { CloudCredentialsOptions } from '#cloud-credentials';
export type {
  ComputeEngineCredentialsOptions,
  ComputeEngineProbeOptions,
} from '#compute-engine';
export type { EnvironmentConfig } from '#config';
export type {
  AuthorizedUserJson,
  CredentialSourceJson,
  CredentialsFromJsonOptions,
  ExternalAccountJson,
  ServiceAccountJson,
} from '#credentials-json';
export type { OAuthErrorDetails } from '#errors';
export type { ExternalAccountCredentialsOptions } from '#external-account';
export type { SignBlobParams } from '#iam';
export type { ImpersonatedCredentialsOptions } from '#impersonated';
export type { ServiceAccountJwtAccessCredentialsOptions } from '#jwt-access';
export type {
  RetryConfig,
  RetryDelayFunction,
  RetryMeta,
  RetryOptions,
  ShouldRetry,
} from '#retry';
export type { ServiceAccountCredentialsOptions } from '#service-account';
export type { ServiceAccountSigner } from '#signer';
export type {
  ClientAuthentication,
  StsRequestHandlerOptions,
  StsTokenExchangeRequest,
  StsTokenExchangeResponse,
} from '#sts';
export type {
  SubjectTokenFormat,
  SubjectTokenSource,
  UrlSubjectTokenSourceOptions,
} from '#subject-token-source';
export type { TokenStore } from '#token-store';
export type {
  FetchTransportOptions,
  HttpRequest,
  HttpResponse,
  HttpTransport,
} from '#transport';
export type { UserCredentialsOptions } from '#user';
export type { ClientId, UserAuthorizerOptions } from '#user-authorizer';

export { CloudCredentials } from '#cloud-credentials';
export {
  COMPUTE_PING_TIMEOUT_MS,
  ComputeEngineCredentials,
  getMetadataServerUrl,
  MAX_COMPUTE_PING_TRIES,
} from '#compute-engine';
export { readEnvironmentConfig } from '#config';
export * from '#constants/endpoints';
export {
  credentialsFromJson,
  externalAccountFromJson,
  jwtAccessFromJson,
  serviceAccountFromJson,
  subjectTokenSourceFromJson,
  userFromJson,
} from '#credentials-json';
export {
  CredentialConfigError,
  CredentialError,
  HttpStatusError,
  MalformedResponseError,
  MetadataServerUnavailableError,
  OAuthError,
  ScopesRequiredError,
  TransportError,
} from '#errors';
export {
  ExternalAccountCredentials,
  extractTargetPrincipal,
} from '#external-account';
export { signBlob } from '#iam';
export {
  ImpersonatedCredentials,
  MAX_TOKEN_LIFETIME_SECONDS,
} from '#impersonated';
export { ServiceAccountJwtAccessCredentials } from '#jwt-access';
export { NonRetryableError, retry } from '#retry';
export { ServiceAccountCredentials } from '#service-account';
export {
  FileSubjectTokenSource,
  UrlSubjectTokenSource,
} from '#subject-token-source';
export { StsRequestHandler } from '#sts';
export { MemoryTokenStore } from '#token-store';
export { defaultTransport, FetchTransport } from '#transport';
export { UserCredentials } from '#user';
export {
  clientIdFromJson,
  DEFAULT_CALLBACK_URI,
  UserAuthorizer,
} from '#user-authorizer';
