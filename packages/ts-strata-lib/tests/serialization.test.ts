import { expect } from "chai";
import {
  jsonDateReviver,
  jsonSerializer,
  serializerForFormat,
  v8Serializer,
} from "../src";

describe("Serializers", () => {
  describe("v8Serializer", () => {
    it("round trips structured values", () => {
      const value = {
        count: 12n,
        seen: new Set(["a", "b"]),
        byName: new Map([["x", 1]]),
        at: new Date("2024-05-06T07:08:09.000Z"),
      };
      expect(v8Serializer.decode(v8Serializer.encode(value))).to.deep.equal(
        value,
      );
    });

    it("encodes to a Uint8Array", () => {
      expect(v8Serializer.encode("x")).to.be.instanceOf(Uint8Array);
    });
  });

  describe("jsonSerializer", () => {
    const text = (bytes: Uint8Array) => new TextDecoder().decode(bytes);

    it("encodes UTF-8 JSON", () => {
      expect(text(jsonSerializer.encode({ a: 1 }))).to.equal('{"a":1}');
    });

    it("encodes dates as tagged objects", () => {
      const bytes = jsonSerializer.encode({
        at: new Date("2024-05-06T07:08:09.000Z"),
        n: 1,
      });
      expect(text(bytes)).to.equal(
        '{"at":{"$date":"2024-05-06T07:08:09.000Z"},"n":1}',
      );
    });

    it("round trips dates and date-like strings", () => {
      const value = {
        at: new Date("2024-05-06T07:08:09.000Z"),
        note: "2024-01-02T03:04:05Z",
        history: [new Date("2023-01-01T00:00:00.000Z"), "2023-01-01T00:00:00Z"],
      };
      const decoded = jsonSerializer.decode(jsonSerializer.encode(value));
      expect(decoded).to.deep.equal(value);
    });

    it("encodes a bare date", () => {
      const at = new Date("2024-05-06T07:08:09.000Z");
      expect(jsonSerializer.decode(jsonSerializer.encode(at))).to.deep.equal(at);
    });
  });

  describe("jsonDateReviver", () => {
    it("leaves untagged values alone", () => {
      expect(jsonDateReviver("k", "2024-05-06T07:08:09Z")).to.equal(
        "2024-05-06T07:08:09Z",
      );
      expect(jsonDateReviver("k", 5)).to.equal(5);
    });

    it("only unwraps a lone tag holding an ISO 8601 string", () => {
      expect(
        jsonDateReviver("k", { $date: "2024-05-06T07:08:09Z" }),
      ).to.deep.equal(new Date("2024-05-06T07:08:09Z"));
      expect(jsonDateReviver("k", { $date: 5 })).to.deep.equal({ $date: 5 });
      expect(
        jsonDateReviver("k", { $date: "2024-05-06T07:08:09Z", extra: 1 }),
      ).to.deep.equal({ $date: "2024-05-06T07:08:09Z", extra: 1 });
    });
  });

  it("selects a serializer by format", () => {
    expect(serializerForFormat("json")).to.equal(jsonSerializer);
    expect(serializerForFormat("v8")).to.equal(v8Serializer);
  });
});
