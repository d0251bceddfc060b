/**
 * Azure Cosmos DB Authentication Module
 */

import { Clock, CosmosCredentials, parseConnectionString } from "../config/index.js";
import { ConfigurationError } from "../errors.js";
import { HttpVerb, MasterKeyAuthProvider } from "./master-key.js";

export {
  MasterKeyAuthProvider,
  createMasterKeyAuth,
  generateAuthToken,
  decodeMasterKey,
  encodeReserved,
  MASTER_KEY_TYPE,
  TOKEN_VERSION,
  type HttpVerb,
  type SigningRequest,
} from "./master-key.js";

/**
 * Produces the signed headers of a request.
 */
export interface CosmosAuthProvider {
  signRequest(verb: HttpVerb, resourceType: string, resourceLink: string): Record<string, string>;
}

/**
 * Create an auth provider from credentials.
 */
export function createAuthProvider(credentials: CosmosCredentials, clock: Clock): CosmosAuthProvider {
  switch (credentials.type) {
    case "master_key":
      return new MasterKeyAuthProvider(credentials.key, clock);

    case "connection_string": {
      const accountKey = parseConnectionString(credentials.connectionString).get("AccountKey");
      if (!accountKey) {
        throw new ConfigurationError(
          "Connection string must contain AccountKey",
          "InvalidConnectionString"
        );
      }
      return new MasterKeyAuthProvider(accountKey, clock);
    }
  }
}
