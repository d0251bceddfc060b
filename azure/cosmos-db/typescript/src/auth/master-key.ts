/**
 * Azure Cosmos DB Master Key Authentication
 *
 * Computes the per-request authorization token for the Cosmos DB REST API.
 */

import { createHmac } from "crypto";
import { API_VERSION, Clock } from "../config/index.js";
import { AuthenticationError } from "../errors.js";

export type HttpVerb = "GET" | "POST" | "PUT" | "DELETE";

export const MASTER_KEY_TYPE = "master";
export const TOKEN_VERSION = "1.0";

/**
 * Inputs of one signature. Built fresh per request since the timestamp must
 * be current.
 */
export interface SigningRequest {
  readonly verb: HttpVerb | Lowercase<HttpVerb>;
  /** Kind of resource: "dbs", "colls", "docs", "offers". */
  readonly resourceType: string;
  /** Path of the resource instance; empty for account-level operations. */
  readonly resourceLink: string;
  /** HTTP-date, identical to the x-ms-date header. */
  readonly timestamp: string;
  /** Base64-encoded master key. */
  readonly secretKey: string;
  readonly keyType?: typeof MASTER_KEY_TYPE;
  readonly tokenVersion?: typeof TOKEN_VERSION;
}

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

/**
 * Decode a master key, rejecting anything that is not canonical base64.
 */
export function decodeMasterKey(secretKey: string): Buffer {
  if (!secretKey) {
    throw new AuthenticationError("Master key must not be empty", "InvalidKey");
  }
  if (!BASE64_PATTERN.test(secretKey)) {
    throw new AuthenticationError("Master key is not valid base64", "InvalidKey");
  }
  return Buffer.from(secretKey, "base64");
}

/**
 * Percent-encode everything except RFC 3986 unreserved characters.
 */
export function encodeReserved(value: string): string {
  return encodeURIComponent(value).replace(
    /[!'()*]/g,
    (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`
  );
}

/**
 * Generate the authorization token for a request.
 *
 * The signed payload is `verb\nresourceType\nresourceLink\ndate\n\n` with the
 * verb, resource type and date lower-cased. The HMAC-SHA256 digest is base64
 * encoded and appended to the lower-cased, URL-encoded
 * `type=master&ver=1.0&sig=` prefix.
 */
export function generateAuthToken(request: SigningRequest): string {
  const { verb, resourceType, resourceLink, timestamp, secretKey } = request;

  const missing = (
    [
      ["verb", verb],
      ["resourceType", resourceType],
      ["timestamp", timestamp],
    ] as const
  ).filter(([, value]) => !value);
  if (missing.length > 0) {
    throw new AuthenticationError(
      `Signing input must not be empty: ${missing.map(([name]) => name).join(", ")}`,
      "InvalidSigningInput"
    );
  }

  const key = decodeMasterKey(secretKey);

  const payload =
    [verb.toLowerCase(), resourceType.toLowerCase(), resourceLink, timestamp.toLowerCase(), ""].join(
      "\n"
    ) + "\n";

  const signature = createHmac("sha256", key).update(payload, "utf8").digest("base64");

  const prefix = `type=${request.keyType ?? MASTER_KEY_TYPE}&ver=${request.tokenVersion ?? TOKEN_VERSION}&sig=`;
  return encodeReserved(prefix).toLowerCase() + encodeReserved(signature);
}

/**
 * Signs requests with an account master key.
 */
export class MasterKeyAuthProvider {
  private readonly masterKey: string;
  private readonly clock: Clock;

  constructor(masterKey: string, clock: Clock) {
    decodeMasterKey(masterKey);
    this.masterKey = masterKey;
    this.clock = clock;
  }

  /**
   * Build the authorization, date and version headers for one request.
   */
  signRequest(verb: HttpVerb, resourceType: string, resourceLink: string): Record<string, string> {
    const date = this.clock.now().toUTCString();

    const authorization = generateAuthToken({
      verb,
      resourceType,
      resourceLink,
      timestamp: date,
      secretKey: this.masterKey,
    });

    return {
      authorization,
      "x-ms-date": date,
      "x-ms-version": API_VERSION,
    };
  }
}

/**
 * Create a master key auth provider.
 */
export function createMasterKeyAuth(masterKey: string, clock: Clock): MasterKeyAuthProvider {
  return new MasterKeyAuthProvider(masterKey, clock);
}
