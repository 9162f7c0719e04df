import { DomainViolationError } from "../errors";
import { Entity } from "../datastore/entity";
import { FilterValue } from "../datastore/query";
import { StorageValue, describeStorageValue } from "../datastore/values";
import {
  ComparisonCriterion,
  InCriterion,
  NullCriterion,
  SortCriterion,
  asc,
  contains,
  desc,
  equal,
  greaterThan,
  greaterThanOrEqual,
  isIn,
  isNotNull,
  isNull,
  lessThan,
  lessThanOrEqual,
  notEqual,
} from "../criteria/criterion";
import { AttributeType, CollectionAttributeType } from "./attributeTypes";
import type { ModelMeta } from "./modelMeta";

/**
 * Reflection-free access to one model property.
 */
export interface Accessor<M, H> {
  get(model: M): H;
  set(model: M, value: H): void;
}

/**
 * Type-erased view of an attribute, as listed by its model meta.
 */
export interface AttributeDesc<M> {
  readonly name: string;
  readonly fieldName: string;
  readonly attributeType: Pick<
    AttributeType<unknown, StorageValue>,
    "name" | "storageKind"
  >;
  copyToModel(entity: Entity, model: M): void;
  copyToEntity(model: M, entity: Entity): void;
}

/** Values an attribute of host type `H` can be compared with. */
export type FilterParameter<H> = Extract<NonNullable<H>, FilterValue>;

/**
 * Meta data of one model attribute: its storage name, the model property it
 * maps to and the converter pair for the property's type.
 *
 * @template M model type
 * @template H host type of the property
 * @template S storage type
 */
export class AttributeMeta<M extends object, H, S extends StorageValue>
  implements AttributeDesc<M>
{
  readonly modelMeta: ModelMeta<M>;
  /** Storage property name. */
  readonly name: string;
  /** Model property name. */
  readonly fieldName: string;
  readonly attributeType: AttributeType<H, S>;
  private readonly accessor: Accessor<M, H>;

  constructor(
    modelMeta: ModelMeta<M>,
    name: string,
    fieldName: string,
    attributeType: AttributeType<H, S>,
    accessor: Accessor<M, H>,
  ) {
    this.modelMeta = modelMeta;
    this.name = name;
    this.fieldName = fieldName;
    this.attributeType = attributeType;
    this.accessor = accessor;
  }

  /**
   * Reads and converts this attribute's property from `entity`.
   */
  read(entity: Entity): H {
    const raw = entity.getProperty(this.name);
    return this.attributeType.toModel(raw === null ? null : this.narrow(raw));
  }

  /**
   * Converts `value` into its stored form.
   */
  write(value: H): S | null {
    return this.attributeType.toEntity(value);
  }

  private narrow(raw: StorageValue): S {
    if (this.attributeType.isStorageValue(raw)) {
      return raw;
    }
    throw new DomainViolationError(
      this.modelMeta.modelClassName,
      this.name,
      this.expectedStorageKind(),
      describeStorageValue(raw),
    );
  }

  protected expectedStorageKind(): string {
    return this.attributeType.storageKind;
  }

  getValue(model: M): H {
    return this.accessor.get(model);
  }

  setValue(model: M, value: H): void {
    this.accessor.set(model, value);
  }

  copyToModel(entity: Entity, model: M): void {
    this.accessor.set(model, this.read(entity));
  }

  copyToEntity(model: M, entity: Entity): void {
    entity.setProperty(this.name, this.write(this.accessor.get(model)));
  }

  equal(value: FilterParameter<H>): ComparisonCriterion {
    return equal(this, value);
  }

  notEqual(value: FilterParameter<H>): ComparisonCriterion {
    return notEqual(this, value);
  }

  lessThan(value: FilterParameter<H>): ComparisonCriterion {
    return lessThan(this, value);
  }

  lessThanOrEqual(value: FilterParameter<H>): ComparisonCriterion {
    return lessThanOrEqual(this, value);
  }

  greaterThan(value: FilterParameter<H>): ComparisonCriterion {
    return greaterThan(this, value);
  }

  greaterThanOrEqual(value: FilterParameter<H>): ComparisonCriterion {
    return greaterThanOrEqual(this, value);
  }

  in(
    values: readonly FilterParameter<H>[] | ReadonlySet<FilterParameter<H>>,
  ): InCriterion {
    return isIn(this, values);
  }

  isNull(): NullCriterion {
    return isNull(this);
  }

  isNotNull(): NullCriterion {
    return isNotNull(this);
  }

  get asc(): SortCriterion {
    return asc(this);
  }

  get desc(): SortCriterion {
    return desc(this);
  }
}

/**
 * Meta data of a multi-valued attribute. Adds element containment.
 *
 * @template E host element type
 */
export class CollectionAttributeMeta<
  M extends object,
  H,
  S extends StorageValue,
  E,
> extends AttributeMeta<M, H, S> {
  declare readonly attributeType: CollectionAttributeType<H, S, E>;

  constructor(
    modelMeta: ModelMeta<M>,
    name: string,
    fieldName: string,
    attributeType: CollectionAttributeType<H, S, E>,
    accessor: Accessor<M, H>,
  ) {
    super(modelMeta, name, fieldName, attributeType, accessor);
  }

  protected expectedStorageKind(): string {
    return `list<${this.attributeType.element.storageKind}>`;
  }

  /**
   * Matches entities whose list holds `value` as one of its elements.
   */
  contains(value: FilterParameter<E>): ComparisonCriterion {
    return contains(this, value);
  }
}
