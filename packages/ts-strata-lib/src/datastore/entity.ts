import { StorageValue } from "./values";

/**
 * A schema-less storage record: a kind, an optional key, and named
 * properties holding storage-native values.
 */
export class Entity {
  readonly kind: string;
  key: string | null;
  private readonly properties = new Map<string, StorageValue>();

  constructor(kind: string, key: string | null = null) {
    this.kind = kind;
    this.key = key;
  }

  /**
   * Returns the stored value, or `null` when the property is absent.
   */
  getProperty(name: string): StorageValue {
    return this.properties.get(name) ?? null;
  }

  setProperty(name: string, value: StorageValue): void {
    this.properties.set(name, value);
  }

  hasProperty(name: string): boolean {
    return this.properties.has(name);
  }

  removeProperty(name: string): boolean {
    return this.properties.delete(name);
  }

  /** Snapshot of the properties in insertion order. */
  getProperties(): ReadonlyMap<string, StorageValue> {
    return new Map(this.properties);
  }

  static fromProperties(
    kind: string,
    properties: Record<string, StorageValue>,
    key: string | null = null,
  ): Entity {
    const entity = new Entity(kind, key);
    for (const [name, value] of Object.entries(properties)) {
      entity.setProperty(name, value);
    }
    return entity;
  }
}
