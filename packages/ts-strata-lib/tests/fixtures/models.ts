import {
  AttributeTypes,
  ModelMeta,
  listOf,
  nullable,
  setOf,
  int32,
  string,
} from "../../src";

export class Person {
  name: string | null = null;
  age = 0;
  height: number | null = null;
  score: bigint | null = null;
  active = false;
  tags: Set<number> | null = null;
  labels: (string | null)[] | null = null;
  notes: string | null = null;
}

export class PersonMeta extends ModelMeta<Person> {
  readonly name = this.attribute("name", AttributeTypes.string);
  readonly age = this.attribute("age", AttributeTypes.primitiveInt);
  readonly height = this.attribute("height", AttributeTypes.double);
  readonly score = this.attribute("score", AttributeTypes.long);
  readonly active = this.attribute("active", AttributeTypes.primitiveBoolean);
  readonly tags = this.collectionAttribute("tags", setOf(int32));
  readonly labels = this.collectionAttribute(
    "labels",
    listOf(nullable(string)),
  );
  readonly notes = this.attribute("notes", AttributeTypes.text);

  constructor() {
    super(Person, { packageName: "app.model" });
  }
}

export const person = (fields: Partial<Person>): Person =>
  Object.assign(new Person(), fields);
