import type { ClientState } from "../state";

export const toDate = (value: string | null | undefined) =>
  value ? new Date(value) : undefined;

/** Anything the entity cache stores */
export abstract class Entity {
  constructor(protected readonly state: ClientState) {}

  abstract readonly id: string;

  /** Key under which the entity is stored in its cache category */
  abstract get cacheKey(): string;

  /**
   * Copies every defined field of `other` onto this instance.
   * `undefined` means "unknown" and is skipped, `null` clears a field.
   */
  assign(other: Entity) {
    for (const [key, value] of Object.entries(other)) {
      if (value !== undefined) {
        Reflect.set(this, key, value);
      }
    }
  }
}
