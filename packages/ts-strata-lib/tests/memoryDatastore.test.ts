import { expect } from "chai";
import {
  Entity,
  InMemoryDatastore,
  Query,
  compareScalars,
  matchesFilter,
} from "../src";
import { Person, PersonMeta, person } from "./fixtures/models";

describe("InMemoryDatastore", () => {
  const meta = new PersonMeta();
  let datastore: InMemoryDatastore;

  const names = (people: Person[]) => people.map((p) => p.name);

  beforeEach(async () => {
    datastore = new InMemoryDatastore();
    await datastore.putModel(
      meta,
      person({ name: "Alice", age: 30, score: 10n, tags: new Set([1, 2]) }),
    );
    await datastore.putModel(
      meta,
      person({ name: "Bob", age: 25, tags: new Set([2, 3]) }),
    );
    await datastore.putModel(meta, person({ name: "Carol", age: 35, score: 5n }));
  });

  describe("entities", () => {
    it("assigns sequential keys", async () => {
      const entity = new Entity("Person");
      const key = await datastore.put(entity);
      expect(key).to.equal("4");
      expect(entity.key).to.equal("4");
    });

    it("keeps the key an entity already has", async () => {
      const key = await datastore.put(new Entity("Person", "p-1"));
      expect(key).to.equal("p-1");
    });

    it("stores copies of entities", async () => {
      const entity = Entity.fromProperties("Person", { name: "Dan" }, "dan");
      await datastore.put(entity);
      entity.setProperty("name", "Changed");
      const stored = await datastore.get("Person", "dan");
      expect(stored?.getProperty("name")).to.equal("Dan");
      expect(stored?.key).to.equal("dan");
    });

    it("returns null for unknown keys and kinds", async () => {
      expect(await datastore.get("Person", "missing")).to.equal(null);
      expect(await datastore.get("Other", "1")).to.equal(null);
    });

    it("deletes entities", async () => {
      expect(await datastore.delete("Person", "1")).to.equal(true);
      expect(await datastore.delete("Person", "1")).to.equal(false);
      expect(await datastore.get("Person", "1")).to.equal(null);
    });

    it("reads models back by key", async () => {
      const alice = await datastore.getModel(meta, "1");
      expect(alice).to.deep.equal(
        person({ name: "Alice", age: 30, score: 10n, tags: new Set([1, 2]) }),
      );
      expect(await datastore.getModel(meta, "99")).to.equal(null);
    });
  });

  describe("queries", () => {
    it("returns every entity of the kind in insertion order", async () => {
      expect(names(await datastore.query(meta).asList())).to.deep.equal([
        "Alice",
        "Bob",
        "Carol",
      ]);
    });

    it("compares stored longs with numeric parameters", async () => {
      const result = await datastore
        .query(meta)
        .filter(meta.age.greaterThan(26))
        .sort(meta.age.asc)
        .asList();
      expect(names(result)).to.deep.equal(["Alice", "Carol"]);
    });

    it("matches contains against any list element", async () => {
      expect(
        names(await datastore.query(meta).filter(meta.tags.contains(2)).asList()),
      ).to.deep.equal(["Alice", "Bob"]);
      expect(
        names(await datastore.query(meta).filter(meta.tags.contains(3)).asList()),
      ).to.deep.equal(["Bob"]);
    });

    it("treats absent values as null", async () => {
      expect(
        names(await datastore.query(meta).filter(meta.score.isNull()).asList()),
      ).to.deep.equal(["Bob"]);
      expect(
        names(
          await datastore
            .query(meta)
            .filter(meta.score.isNotNull())
            .sort(meta.score.desc)
            .asList(),
        ),
      ).to.deep.equal(["Alice", "Carol"]);
      expect(
        names(
          await datastore.query(meta).filter(meta.score.lessThan(100n)).asList(),
        ),
      ).to.deep.equal(["Alice", "Carol"]);
    });

    it("matches in terms against any candidate", async () => {
      const result = await datastore
        .query(meta)
        .filter(meta.name.in(["Carol", "Bob"]))
        .asList();
      expect(names(result)).to.deep.equal(["Bob", "Carol"]);
    });

    it("requires every filter term to match", async () => {
      const result = await datastore
        .query(meta)
        .filter(meta.age.lessThanOrEqual(30), meta.name.notEqual("Alice"))
        .asList();
      expect(names(result)).to.deep.equal(["Bob"]);
    });

    it("sorts absent values first", async () => {
      const result = await datastore.query(meta).sort(meta.score.asc).asList();
      expect(names(result)).to.deep.equal(["Bob", "Carol", "Alice"]);
    });

    it("sorts lists by their largest element when descending", async () => {
      const result = await datastore.query(meta).sort(meta.tags.desc).asList();
      expect(names(result)).to.deep.equal(["Bob", "Alice", "Carol"]);
    });

    it("applies offset and limit after counting", async () => {
      const result = await datastore
        .query(meta)
        .sort(meta.name.desc)
        .limit(2)
        .execute();
      expect(names(result.data)).to.deep.equal(["Carol", "Bob"]);
      expect(result.count).to.equal(3);
      expect(result.hasMore).to.equal(true);

      const rest = await datastore
        .query(meta)
        .sort(meta.name.desc)
        .offset(2)
        .execute();
      expect(names(rest.data)).to.deep.equal(["Alice"]);
      expect(rest.hasMore).to.equal(false);
    });

    it("returns a single model or null", async () => {
      const bob = await datastore
        .query(meta)
        .filter(meta.name.equal("Bob"))
        .asSingle();
      expect(bob?.age).to.equal(25);
      const nobody = await datastore
        .query(meta)
        .filter(meta.name.equal("Zed"))
        .asSingle();
      expect(nobody).to.equal(null);
    });

    it("keeps the builder's limit after a single lookup", async () => {
      const query = datastore.query(meta).sort(meta.age.asc);
      expect((await query.asSingle())?.name).to.equal("Bob");
      expect(names(await query.asList())).to.deep.equal([
        "Bob",
        "Alice",
        "Carol",
      ]);
      expect(await query.count()).to.equal(3);

      const limited = datastore.query(meta).sort(meta.age.asc).limit(2);
      await limited.asSingle();
      expect(names(await limited.asList())).to.deep.equal(["Bob", "Alice"]);
    });

    it("counts matches", async () => {
      expect(
        await datastore.query(meta).filter(meta.active.equal(false)).count(),
      ).to.equal(3);
    });

    it("runs entity queries", async () => {
      const result = await datastore.execute(
        new Query("Person").addFilter("name", "EQUAL", "Carol"),
      );
      expect(result.data).to.have.length(1);
      expect(result.data[0].getProperty("age")).to.equal(35n);
    });
  });

  describe("matchesFilter", () => {
    const entity = Entity.fromProperties("Person", {
      age: 30n,
      tags: [1n, 2n],
      name: "Ann",
    });

    it("matches only EQUAL null on absent properties", () => {
      expect(
        matchesFilter(entity, {
          propertyName: "missing",
          operator: "EQUAL",
          value: null,
        }),
      ).to.equal(true);
      expect(
        matchesFilter(entity, {
          propertyName: "missing",
          operator: "NOT_EQUAL",
          value: 1,
        }),
      ).to.equal(false);
    });

    it("does not order values of different kinds", () => {
      expect(
        matchesFilter(entity, {
          propertyName: "name",
          operator: "LESS_THAN",
          value: 5,
        }),
      ).to.equal(false);
    });

    it("matches an equality against any list element", () => {
      expect(
        matchesFilter(entity, {
          propertyName: "tags",
          operator: "EQUAL",
          value: 2,
        }),
      ).to.equal(true);
    });
  });

  describe("compareScalars", () => {
    it("orders numbers across bigint and number", () => {
      expect(compareScalars(1n, 2)).to.equal(-1);
      expect(compareScalars(2.5, 2n)).to.equal(1);
      expect(compareScalars(3n, 3)).to.equal(0);
    });

    it("orders strings and booleans", () => {
      expect(compareScalars("a", "b")).to.equal(-1);
      expect(compareScalars(true, false)).to.equal(1);
    });

    it("does not order values of different kinds", () => {
      expect(compareScalars("a", 1)).to.equal(undefined);
    });
  });
});
