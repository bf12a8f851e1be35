/**
 * Bearer Token Resolution
 *
 * The backup service token comes from configuration, or from a Secrets
 * Manager secret holding either the bare token or a one-entry JSON object.
 */

import { GetSecretValueCommand, SecretsManagerClient } from "@aws-sdk/client-secrets-manager";
import { AuthError, formatErrorMessage } from "../errors.js";
import type { ApiConfig } from "../config/index.js";

export type TokenSource = Pick<ApiConfig, "token" | "tokenSecretArn">;

export type ResolveTokenOptions = {
  /** Region used when the ARN does not carry one */
  region?: string;
  secretsClient?: SecretsManagerClient;
};

const ARN_REGION_PATTERN = /^arn:[^:]+:secretsmanager:([^:]+):/;

/**
 * Region segment of a Secrets Manager ARN
 */
export function regionFromSecretArn(arn: string): string | undefined {
  return ARN_REGION_PATTERN.exec(arn)?.[1];
}

/**
 * Pull the token out of a secret string
 */
export function extractToken(secretString: string): string | undefined {
  const trimmed = secretString.trim();
  if (!trimmed.startsWith("{")) return trimmed || undefined;

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch {
    return undefined;
  }
  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) return undefined;

  const first = Object.values(parsed).find((value) => typeof value === "string" && value.length > 0);
  return typeof first === "string" ? first : undefined;
}

export async function resolveBearerToken(source: TokenSource, options: ResolveTokenOptions = {}): Promise<string> {
  if (source.token) return source.token;

  const arn = source.tokenSecretArn;
  if (!arn) {
    throw new AuthError("No bearer token configured; set BULK_RESTORE_TOKEN or BULK_RESTORE_TOKEN_ARN");
  }

  const client =
    options.secretsClient ?? new SecretsManagerClient({ region: regionFromSecretArn(arn) ?? options.region });

  let secretString: string | undefined;
  try {
    const response = await client.send(new GetSecretValueCommand({ SecretId: arn }));
    secretString = response.SecretString;
  } catch (err) {
    throw new AuthError(`Failed to read bearer token from ${arn}: ${formatErrorMessage(err)}`);
  }

  const token = secretString === undefined ? undefined : extractToken(secretString);
  if (!token) {
    throw new AuthError(`Secret ${arn} does not hold a bearer token`);
  }
  return token;
}
