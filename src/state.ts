import type { EntityCache } from "./cache/entity-cache";
import type { ClientUser } from "./models/user";
import type { ResourceClient } from "./rest";

/** What every domain object needs to reach back into the client */
export interface ClientState {
  readonly cache: EntityCache;
  readonly resource: ResourceClient;
  readonly user: ClientUser | null;
}
