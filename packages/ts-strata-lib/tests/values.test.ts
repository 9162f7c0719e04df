import { expect } from "chai";
import {
  Blob,
  Entity,
  ShortBlob,
  Text,
  describeStorageValue,
  isDoubleList,
  isLongList,
  storageValuesEqual,
} from "../src";

describe("Storage values", () => {
  describe("storageValuesEqual", () => {
    it("compares numbers across bigint and number", () => {
      expect(storageValuesEqual(2n, 2)).to.equal(true);
      expect(storageValuesEqual(2n, 3)).to.equal(false);
    });

    it("compares texts and blobs by content", () => {
      expect(storageValuesEqual(new Text("a"), new Text("a"))).to.equal(true);
      expect(
        storageValuesEqual(
          new ShortBlob(Uint8Array.of(1)),
          new Blob(Uint8Array.of(1)),
        ),
      ).to.equal(false);
      expect(storageValuesEqual(new Text("a"), "a")).to.equal(false);
    });

    it("compares lists element-wise", () => {
      expect(storageValuesEqual([1n, null], [1n, null])).to.equal(true);
      expect(storageValuesEqual([1n], [1n, 2n])).to.equal(false);
      expect(storageValuesEqual([1n], 1n)).to.equal(false);
    });

    it("treats null as equal only to null", () => {
      expect(storageValuesEqual(null, null)).to.equal(true);
      expect(storageValuesEqual(null, 0)).to.equal(false);
    });
  });

  it("describes stored value kinds", () => {
    expect(describeStorageValue(null)).to.equal("null");
    expect(describeStorageValue([1n])).to.equal("list<long>");
    expect(describeStorageValue(["a", null, 1n, "b"])).to.equal(
      "list<string|long>",
    );
    expect(describeStorageValue([null])).to.equal("list");
    expect(describeStorageValue(new Text("x"))).to.equal("Text");
    expect(describeStorageValue(1n)).to.equal("long");
    expect(describeStorageValue(1.5)).to.equal("double");
    expect(describeStorageValue(true)).to.equal("boolean");
    expect(describeStorageValue("x")).to.equal("string");
  });

  it("recognizes long and double lists", () => {
    expect(isLongList([1n, null])).to.equal(true);
    expect(isLongList([1])).to.equal(false);
    expect(isDoubleList([1.5, null])).to.equal(true);
    expect(isDoubleList("1.5")).to.equal(false);
  });

  describe("Entity", () => {
    it("reads absent properties as null", () => {
      const entity = new Entity("Person");
      expect(entity.getProperty("name")).to.equal(null);
      expect(entity.hasProperty("name")).to.equal(false);
    });

    it("distinguishes a stored null from an absent property", () => {
      const entity = Entity.fromProperties("Person", { name: null });
      expect(entity.hasProperty("name")).to.equal(true);
      expect(entity.removeProperty("name")).to.equal(true);
      expect(entity.hasProperty("name")).to.equal(false);
    });

    it("returns a snapshot of its properties", () => {
      const entity = Entity.fromProperties("Person", { a: 1n }, "k");
      const properties = entity.getProperties();
      entity.setProperty("b", 2n);
      expect([...properties.keys()]).to.deep.equal(["a"]);
      expect(entity.key).to.equal("k");
    });
  });
});
