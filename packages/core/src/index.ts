export type { Clock } from '#clock';
export type {
  CredentialsOptions,
  RequestMetadata,
  RequestMetadataCallback,
  RequestMetadataOptions,
} from '#credentials';
export type { Executor } from '#executor';
export type {
  JsonArray,
  JsonifibleObject,
  JsonifibleValue,
  JsonObject,
  JsonPrimitive,
  JsonValue,
} from '#json';
export type { Log, LogLevel } from '#logging';
export type {
  CredentialsChangedListener,
  FreshnessState,
  OAuth2CredentialsOptions,
  OAuthValue,
} from '#oauth2-credentials';

export { AccessToken } from '#access-token';
export { systemClock } from '#clock';
export {
  AUTHORIZATION_HEADER,
  BEARER_PREFIX,
} from '#constants/http';
export {
  HOUR_IN_SECONDS,
  MINIMUM_VALIDITY_MS,
  MINUTES_TO_MS,
  MS_PER_SECOND,
  REFRESH_MARGIN_MS,
} from '#constants/time';
export { Credentials } from '#credentials';
export {
  jsonifyError,
  RefreshAbortedError,
  RefreshNotSupportedError,
} from '#error';
export { asyncExecutor, directExecutor } from '#executor';
export { isJsonObject } from '#json';
export { filterLog } from '#logging';
export { OAuth2Credentials } from '#oauth2-credentials';
