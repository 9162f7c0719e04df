import { mapperLog } from "../commons";
import { Entity } from "../datastore/entity";
import { Query } from "../datastore/query";
import { StorageValue } from "../datastore/values";
import { InvalidArgumentError, requireArgument } from "../errors";
import {
  Accessor,
  AttributeDesc,
  AttributeMeta,
  CollectionAttributeMeta,
} from "./attributeMeta";
import { AttributeType, CollectionAttributeType } from "./attributeTypes";

/**
 * A model class: constructible without arguments.
 */
export type ModelClass<M> = new () => M;

export interface ModelMetaOptions {
  /** Package or module path of the model type, e.g. "app.model". */
  packageName?: string;
  /** Defaults to the model class's name. */
  simpleName?: string;
  /** Entity kind written by modelToEntity. Defaults to simpleName. */
  kind?: string;
  /** False when the model type is nested inside another type. */
  topLevel?: boolean;
}

export interface AttributeOptions<M, H> {
  /** Storage property name. Defaults to the model property name. */
  name?: string;
  /** Getter used instead of plain property access. */
  get?: (model: M) => H;
  /** Setter used instead of plain property assignment. */
  set?: (model: M, value: H) => void;
}

/**
 * Meta data of a model type. Subclasses declare one readonly field per
 * attribute with {@link ModelMeta.attribute}; declaration order is the
 * attribute order.
 *
 * @example
 * ```ts
 * class PersonMeta extends ModelMeta<Person> {
 *   readonly name = this.attribute("name", AttributeTypes.string);
 *   readonly tags = this.collectionAttribute("tags", setOf(int32));
 *
 *   constructor() {
 *     super(Person, { packageName: "app.model" });
 *   }
 * }
 * ```
 */
export class ModelMeta<M extends object> {
  readonly modelClass: ModelClass<M>;
  readonly packageName: string;
  readonly simpleName: string;
  /** Qualified name: packageName.simpleName, or simpleName alone. */
  readonly modelClassName: string;
  readonly kind: string;
  readonly topLevel: boolean;

  private readonly attributeDescList: AttributeDesc<M>[] = [];
  private attributeDescView: readonly AttributeDesc<M>[] | undefined;

  /**
   * @throws {InvalidArgumentError} if modelClass is null or undefined
   */
  constructor(
    modelClass: ModelClass<M> | null | undefined,
    options: ModelMetaOptions = {},
  ) {
    this.modelClass = requireArgument(modelClass, "modelClass");
    this.packageName = options.packageName ?? "";
    this.simpleName = options.simpleName ?? this.modelClass.name;
    this.modelClassName =
      this.packageName.length > 0 ?
        `${this.packageName}.${this.simpleName}`
      : this.simpleName;
    this.kind = options.kind ?? this.simpleName;
    this.topLevel = options.topLevel ?? true;
  }

  getModelClass(): ModelClass<M> {
    return this.modelClass;
  }

  isSealed(): boolean {
    return this.attributeDescView !== undefined;
  }

  /**
   * Declares a single-valued attribute for the model property `fieldName`.
   */
  protected attribute<K extends keyof M & string, S extends StorageValue>(
    fieldName: K,
    attributeType: AttributeType<M[K], S>,
    options: AttributeOptions<M, M[K]> = {},
  ): AttributeMeta<M, M[K], S> {
    return this.addAttributeDesc(
      new AttributeMeta(
        this,
        this.storageName(fieldName, options),
        fieldName,
        attributeType,
        this.accessor(fieldName, options),
      ),
    );
  }

  /**
   * Declares a multi-valued attribute for the model property `fieldName`.
   */
  protected collectionAttribute<
    K extends keyof M & string,
    S extends StorageValue,
    E,
  >(
    fieldName: K,
    attributeType: CollectionAttributeType<M[K], S, E>,
    options: AttributeOptions<M, M[K]> = {},
  ): CollectionAttributeMeta<M, M[K], S, E> {
    return this.addAttributeDesc(
      new CollectionAttributeMeta(
        this,
        this.storageName(fieldName, options),
        fieldName,
        attributeType,
        this.accessor(fieldName, options),
      ),
    );
  }

  private storageName<K extends keyof M & string>(
    fieldName: K,
    options: AttributeOptions<M, M[K]>,
  ): string {
    return options.name ?? fieldName;
  }

  private accessor<K extends keyof M & string>(
    fieldName: K,
    options: AttributeOptions<M, M[K]>,
  ): Accessor<M, M[K]> {
    return {
      get: options.get ?? ((model) => model[fieldName]),
      set:
        options.set ??
        ((model, value) => {
          model[fieldName] = value;
        }),
    };
  }

  private addAttributeDesc<A extends AttributeDesc<M>>(attributeDesc: A): A {
    if (this.isSealed()) {
      throw new InvalidArgumentError(
        `Cannot add attribute "${attributeDesc.name}" to sealed meta ${this.modelClassName}.`,
      );
    }
    if (this.attributeDescList.some((a) => a.name === attributeDesc.name)) {
      throw new InvalidArgumentError(
        `Duplicate attribute name "${attributeDesc.name}" in ${this.modelClassName}.`,
      );
    }
    this.attributeDescList.push(attributeDesc);
    return attributeDesc;
  }

  /**
   * Ends attribute declaration. Called implicitly on first use.
   */
  seal(): this {
    if (this.attributeDescView === undefined) {
      this.attributeDescView = Object.freeze([...this.attributeDescList]);
      mapperLog(
        "Model meta sealed",
        {
          model: this.modelClassName,
          attributes: this.attributeDescList.length,
        },
        "debug",
      );
    }
    return this;
  }

  /**
   * Attributes in declaration order, as a frozen array.
   */
  getAttributeDescList(): readonly AttributeDesc<M>[] {
    this.seal();
    return this.attributeDescView ?? [];
  }

  getAttributeDesc(name: string): AttributeDesc<M> | undefined {
    return this.getAttributeDescList().find((a) => a.name === name);
  }

  /**
   * Converts the entity to a new model. Properties without a declared
   * attribute are ignored.
   */
  entityToModel(entity: Entity): M {
    const model = new this.modelClass();
    for (const attributeDesc of this.getAttributeDescList()) {
      attributeDesc.copyToModel(entity, model);
    }
    return model;
  }

  /**
   * Converts the model to a new entity of this meta's kind.
   */
  modelToEntity(model: M, key: string | null = null): Entity {
    const entity = new Entity(this.kind, key);
    for (const attributeDesc of this.getAttributeDescList()) {
      attributeDesc.copyToEntity(model, entity);
    }
    return entity;
  }

  /**
   * A new query over this meta's entity kind.
   */
  query(): Query {
    return new Query(this.kind);
  }
}
