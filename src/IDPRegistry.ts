import { EntityDescriptor } from "./types";

/**
 * Trusted IdPs keyed by entity ID, last write wins.
 *
 * `primary` is tracked separately for single-IdP callers: it is whatever was
 * added most recently, or the initial descriptor until the first `add`. The
 * initial descriptor is not stored under its entity ID.
 */
export class IDPRegistry {
    private readonly entities = new Map<string, EntityDescriptor>();
    private current: EntityDescriptor | null;

    constructor(initial?: EntityDescriptor) {
        this.current = initial ?? null;
    }

    add(entity: EntityDescriptor): void {
        this.entities.set(entity.entityID, entity);
        this.current = entity;
    }

    get primary(): EntityDescriptor | null {
        return this.current;
    }

    get(entityID: string): EntityDescriptor | undefined {
        return this.entities.get(entityID);
    }

    has(entityID: string): boolean {
        return this.entities.has(entityID);
    }

    get size(): number {
        return this.entities.size;
    }

    entityIDs(): string[] {
        return [...this.entities.keys()];
    }

    values(): EntityDescriptor[] {
        return [...this.entities.values()];
    }
}
