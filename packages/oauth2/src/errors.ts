/**
 * base class of every failure raised while obtaining or using credentials
 *
 * subclasses set their own name so that callers and logs can tell them apart
 */
export class CredentialError extends Error {
  /**
   * creates new credential error
   * @param message error message describing the failure
   * @param options standard error options, e.g. the underlying cause
   */
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'CredentialError';
  }
}

/** failure to reach a server at all */
export class TransportError extends CredentialError {
  /**
   * creates new transport error
   * @param message error message describing the failure
   * @param options standard error options, e.g. the underlying cause
   */
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'TransportError';
  }
}

/** the metadata server host cannot be resolved, i.e. not on compute engine */
export class MetadataServerUnavailableError extends TransportError {
  /**
   * creates new metadata server error
   * @param message error message describing the failure
   * @param options standard error options, e.g. the underlying cause
   */
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'MetadataServerUnavailableError';
  }
}

/** a server answered with a status other than the expected one */
export class HttpStatusError extends CredentialError {
  /** HTTP status code of the response */
  public readonly status: number;
  /** raw body of the response */
  public readonly body: string;

  /**
   * creates new status error
   * @param message error message describing the failure
   * @param status HTTP status code of the response
   * @param body raw body of the response
   */
  constructor(message: string, status: number, body: string) {
    super(message);
    this.name = 'HttpStatusError';
    this.status = status;
    this.body = body;
  }
}

/** details of an oauth2 error response body */
export interface OAuthErrorDetails {
  /** error code, e.g. invalid_grant */
  error: string;
  /** human readable description */
  errorDescription?: string;
  /** page with more information */
  errorUri?: string;
}

/** a token server rejected the request with an oauth2 error body */
export class OAuthError extends HttpStatusError {
  /** error code, e.g. invalid_grant */
  public readonly code: string;
  /** human readable description */
  public readonly description?: string;
  /** page with more information */
  public readonly uri?: string;

  /**
   * creates new oauth error
   * @param message error message describing the failure
   * @param status HTTP status code of the response
   * @param body raw body of the response
   * @param details parsed error fields
   */
  constructor(
    message: string,
    status: number,
    body: string,
    details: OAuthErrorDetails,
  ) {
    super(message, status, body);
    this.name = 'OAuthError';
    this.code = details.error;
    this.description = details.errorDescription;
    this.uri = details.errorUri;
  }
}

/** a response was received but lacks or mistypes a required field */
export class MalformedResponseError extends CredentialError {
  /**
   * creates new malformed response error
   * @param message error message describing the failure
   * @param options standard error options, e.g. the underlying cause
   */
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'MalformedResponseError';
  }
}

/** credentials were built from missing or inconsistent configuration */
export class CredentialConfigError extends CredentialError {
  /**
   * creates new configuration error
   * @param message error message describing the failure
   * @param options standard error options, e.g. the underlying cause
   */
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'CredentialConfigError';
  }
}

/** the credentials need scopes before they can obtain a token */
export class ScopesRequiredError extends CredentialConfigError {
  /**
   * creates new scopes error
   * @param message error message describing the failure
   */
  constructor(
    message = 'scopes not configured, call createScoped before refreshing',
  ) {
    super(message);
    this.name = 'ScopesRequiredError';
  }
}
