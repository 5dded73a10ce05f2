/**
 * @file credentials loaded from their json representation
 *
 * the shapes are those of downloaded key files and of files written by
 * command-line tools; each is validated before any credential is built
 */

import { Ajv } from 'ajv';

import { CredentialConfigError } from '#errors';
import { ExternalAccountCredentials } from '#external-account';
import { ServiceAccountJwtAccessCredentials } from '#jwt-access';
import { ServiceAccountCredentials } from '#service-account';
import {
  FileSubjectTokenSource,
  UrlSubjectTokenSource,
} from '#subject-token-source';
import { defaultTransport } from '#transport';
import { UserCredentials } from '#user';

import type { JSONSchemaType, ValidateFunction } from 'ajv';

import type {
  CloudCredentials,
  CloudCredentialsOptions,
} from '#cloud-credentials';
import type {
  SubjectTokenFormat,
  SubjectTokenSource,
} from '#subject-token-source';
import type { HttpTransport } from '#transport';

/* eslint-disable @typescript-eslint/naming-convention */

/** json of a service account key */
export interface ServiceAccountJson {
  type: 'service_account';
  client_id?: string;
  client_email: string;
  private_key: string;
  private_key_id: string;
  project_id?: string;
  quota_project_id?: string;
  token_uri?: string;
}

/** json of an authorized user */
export interface AuthorizedUserJson {
  type: 'authorized_user';
  client_id: string;
  client_secret: string;
  refresh_token: string;
  quota_project_id?: string;
}

/** json describing where an external account finds its subject token */
export interface CredentialSourceJson {
  file?: string;
  url?: string;
  headers?: Record<string, string>;
  environment_id?: string;
  format?: { type: 'text' | 'json'; subject_token_field_name?: string };
}

/** json of an external account */
export interface ExternalAccountJson {
  type: 'external_account';
  audience: string;
  subject_token_type: string;
  token_url: string;
  credential_source: CredentialSourceJson;
  token_info_url?: string;
  service_account_impersonation_url?: string;
  client_id?: string;
  client_secret?: string;
  quota_project_id?: string;
}

/* eslint-enable @typescript-eslint/naming-convention */

/** options applied to credentials loaded from json */
export type CredentialsFromJsonOptions = Pick<
  CloudCredentialsOptions,
  'clock' | 'log' | 'transport'
>;

const serviceAccountSchema: JSONSchemaType<ServiceAccountJson> = {
  type: 'object',
  properties: {
    type: { type: 'string', const: 'service_account' },
    client_id: { type: 'string', nullable: true },
    client_email: { type: 'string', minLength: 1 },
    private_key: { type: 'string', minLength: 1 },
    private_key_id: { type: 'string', minLength: 1 },
    project_id: { type: 'string', nullable: true },
    quota_project_id: { type: 'string', nullable: true },
    token_uri: { type: 'string', nullable: true },
  },
  required: ['type', 'client_email', 'private_key', 'private_key_id'],
};

const authorizedUserSchema: JSONSchemaType<AuthorizedUserJson> = {
  type: 'object',
  properties: {
    type: { type: 'string', const: 'authorized_user' },
    client_id: { type: 'string', minLength: 1 },
    client_secret: { type: 'string', minLength: 1 },
    refresh_token: { type: 'string', minLength: 1 },
    quota_project_id: { type: 'string', nullable: true },
  },
  required: ['type', 'client_id', 'client_secret', 'refresh_token'],
};

const credentialSourceSchema: JSONSchemaType<CredentialSourceJson> = {
  type: 'object',
  properties: {
    file: { type: 'string', minLength: 1, nullable: true },
    url: { type: 'string', minLength: 1, nullable: true },
    headers: {
      type: 'object',
      additionalProperties: { type: 'string' },
      required: [],
      nullable: true,
    },
    environment_id: { type: 'string', nullable: true },
    format: {
      type: 'object',
      properties: {
        type: { type: 'string', enum: ['text', 'json'] },
        subject_token_field_name: {
          type: 'string',
          minLength: 1,
          nullable: true,
        },
      },
      required: ['type'],
      nullable: true,
    },
  },
  required: [],
};

const externalAccountSchema: JSONSchemaType<ExternalAccountJson> = {
  type: 'object',
  properties: {
    type: { type: 'string', const: 'external_account' },
    audience: { type: 'string', minLength: 1 },
    subject_token_type: { type: 'string', minLength: 1 },
    token_url: { type: 'string', minLength: 1 },
    credential_source: credentialSourceSchema,
    token_info_url: { type: 'string', nullable: true },
    service_account_impersonation_url: { type: 'string', nullable: true },
    client_id: { type: 'string', nullable: true },
    client_secret: { type: 'string', nullable: true },
    quota_project_id: { type: 'string', nullable: true },
  },
  required: [
    'type',
    'audience',
    'subject_token_type',
    'token_url',
    'credential_source',
  ],
};

const ajv = new Ajv();
const validateServiceAccount = ajv.compile<ServiceAccountJson>(
  serviceAccountSchema,
);
const validateAuthorizedUser = ajv.compile<AuthorizedUserJson>(
  authorizedUserSchema,
);
const validateExternalAccount = ajv.compile<ExternalAccountJson>(
  externalAccountSchema,
);

/**
 * validates json against a compiled schema
 * @param validate compiled schema
 * @param json value to validate
 * @param kind description of the credentials for error messages
 * @returns the validated value
 */
function parse<T>(
  validate: ValidateFunction<T>,
  json: unknown,
  kind: string,
): T {
  if (!validate(json)) {
    throw new CredentialConfigError(
      `error reading ${kind} credentials from json: ${ajv.errorsText(validate.errors)}`,
    );
  }

  return json;
}

/**
 * creates service account credentials from a key file
 * @param json parsed key file
 * @param options options applied to the credentials
 * @returns unscoped credentials
 */
export function serviceAccountFromJson(
  json: unknown,
  options: CredentialsFromJsonOptions = {},
): ServiceAccountCredentials {
  const data = parse(validateServiceAccount, json, 'service account');

  return new ServiceAccountCredentials({
    ...options,
    clientId: data.client_id,
    clientEmail: data.client_email,
    privateKey: data.private_key,
    privateKeyId: data.private_key_id,
    projectId: data.project_id,
    quotaProjectId: data.quota_project_id,
    tokenServerUri: data.token_uri,
  });
}

/**
 * creates jwt access credentials from a service account key file
 * @param json parsed key file
 * @param options options applied to the credentials
 * @param options.defaultAudience audience used when a request names no target
 * @returns jwt access credentials
 */
export function jwtAccessFromJson(
  json: unknown,
  options: Pick<CredentialsFromJsonOptions, 'clock' | 'log'> & {
    defaultAudience?: string;
  } = {},
): ServiceAccountJwtAccessCredentials {
  const data = parse(validateServiceAccount, json, 'service account');

  return new ServiceAccountJwtAccessCredentials({
    ...options,
    clientId: data.client_id,
    clientEmail: data.client_email,
    privateKey: data.private_key,
    privateKeyId: data.private_key_id,
  });
}

/**
 * creates user credentials from an authorized user file
 * @param json parsed file
 * @param options options applied to the credentials
 * @returns user credentials
 */
export function userFromJson(
  json: unknown,
  options: CredentialsFromJsonOptions = {},
): UserCredentials {
  const data = parse(validateAuthorizedUser, json, 'authorized user');

  return new UserCredentials({
    ...options,
    clientId: data.client_id,
    clientSecret: data.client_secret,
    refreshToken: data.refresh_token,
    quotaProjectId: data.quota_project_id,
  });
}

/**
 * creates the subject token source an external account file describes
 * @param json credential_source section
 * @param transport transport for url sources
 * @returns the source
 * @throws {CredentialConfigError} when the section names no supported source
 */
export function subjectTokenSourceFromJson(
  json: CredentialSourceJson,
  transport: HttpTransport = defaultTransport,
): SubjectTokenSource {
  const format: SubjectTokenFormat =
    json.format?.type === 'json'
      ? {
          type: 'json',
          subjectTokenFieldName: requireFieldName(
            json.format.subject_token_field_name,
          ),
        }
      : { type: 'text' };

  if (json.environment_id) {
    throw new CredentialConfigError(
      `unsupported credential source environment ${json.environment_id}`,
    );
  }

  if (json.file) {
    return new FileSubjectTokenSource(json.file, format);
  }

  if (json.url) {
    return new UrlSubjectTokenSource({
      url: json.url,
      headers: json.headers,
      format,
      transport,
    });
  }

  throw new CredentialConfigError(
    'credential source must specify either a file or an url',
  );
}

/**
 * checks the field name of a json subject token format
 * @param name configured field name
 * @returns the field name
 */
function requireFieldName(name: string | undefined): string {
  if (!name) {
    throw new CredentialConfigError(
      'credential source format of type json requires subject_token_field_name',
    );
  }

  return name;
}

/**
 * creates external account credentials from a configuration file
 * @param json parsed file
 * @param options options applied to the credentials
 * @returns external account credentials
 */
export function externalAccountFromJson(
  json: unknown,
  options: CredentialsFromJsonOptions = {},
): ExternalAccountCredentials {
  const data = parse(validateExternalAccount, json, 'external account');

  return new ExternalAccountCredentials({
    ...options,
    audience: data.audience,
    subjectTokenType: data.subject_token_type,
    tokenUrl: data.token_url,
    credentialSource: subjectTokenSourceFromJson(
      data.credential_source,
      options.transport,
    ),
    tokenInfoUrl: data.token_info_url,
    serviceAccountImpersonationUrl: data.service_account_impersonation_url,
    clientId: data.client_id,
    clientSecret: data.client_secret,
    quotaProjectId: data.quota_project_id,
  });
}

/**
 * creates credentials from any supported json representation
 * @param json parsed file, dispatched on its `type` field
 * @param options options applied to the credentials
 * @returns the credentials
 * @throws {CredentialConfigError} when the type is missing or unsupported
 */
export function credentialsFromJson(
  json: unknown,
  options: CredentialsFromJsonOptions = {},
): CloudCredentials {
  const type =
    typeof json === 'object' && json !== null && 'type' in json
      ? json.type
      : undefined;

  switch (type) {
    case 'service_account':
      return serviceAccountFromJson(json, options);
    case 'authorized_user':
      return userFromJson(json, options);
    case 'external_account':
      return externalAccountFromJson(json, options);
    default:
      throw new CredentialConfigError(
        `error reading credentials from json: unsupported type ${JSON.stringify(type ?? null)}`,
      );
  }
}
