import { expect } from "chai";
import { SortedSet } from "../src";

describe("SortedSet", () => {
  const ascending = (a: number, b: number) => a - b;

  it("iterates in comparator order whatever the insertion order", () => {
    const set = new SortedSet(ascending, [5, 1, 3]);
    expect([...set]).to.deep.equal([1, 3, 5]);
    expect(set.size).to.equal(3);
  });

  it("ignores elements that compare equal to a member", () => {
    const set = new SortedSet(ascending);
    set.add(2).add(2).add(1);
    expect(set.toArray()).to.deep.equal([1, 2]);
  });

  it("decides membership with the comparator", () => {
    const byLength = new SortedSet<string>(
      (a, b) => a.length - b.length,
      ["ccc", "a"],
    );
    expect(byLength.has("b")).to.equal(true);
    expect(byLength.has("bb")).to.equal(false);
  });

  it("deletes and clears", () => {
    const set = new SortedSet(ascending, [1, 2, 3]);
    expect(set.delete(2)).to.equal(true);
    expect(set.delete(2)).to.equal(false);
    expect(set.toArray()).to.deep.equal([1, 3]);
    set.clear();
    expect(set.size).to.equal(0);
    expect(set.first()).to.equal(undefined);
  });

  it("exposes its first and last elements", () => {
    const set = new SortedSet<number>((a, b) => b - a, [4, 9, 6]);
    expect(set.first()).to.equal(9);
    expect(set.last()).to.equal(4);
  });
});
