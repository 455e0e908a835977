import {
  createAnonDbClient,
  createServiceRoleDbClient,
} from "../../packages/db/src/client";
import type { DbClient } from "../../packages/db/src/types";

let serviceRoleClient: DbClient | null = null;

/** Process-wide service-role client. Row policies do not apply to it. */
export function getServiceRoleDbClient(): DbClient {
  if (!serviceRoleClient) {
    serviceRoleClient = createServiceRoleDbClient();
  }
  return serviceRoleClient;
}

/**
 * Client that runs every query as the caller: anon key plus the caller's
 * `Authorization` header, so row policies see `auth.uid()`.
 */
export function createUserScopedDbClient(authorization: string): DbClient {
  return createAnonDbClient({ authorization });
}

export function createPublicDbClient(): DbClient {
  return createAnonDbClient();
}
