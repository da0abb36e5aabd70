import { describe, it, after } from "mocha";
import { expect } from "chai";
import { classifyMember, okVerdict, type TypeRef } from "@valuesem/engine";
import {
  createTestHarness,
  getDeclaredType,
} from "../types/test-harness.js";
import { createTypeRefFactory } from "./factory.js";

describe("TypeRef factory", () => {
  const harness = createTestHarness(`
class Point implements struct {
  static readonly origin = new Point(0, 0);
  private scale: number = 1;
  constructor(readonly x: number, readonly y: number) {}
  get length(): number { return Math.hypot(this.x, this.y); }
  move(dx: number): Point { return new Point(this.x + dx, this.y); }
}
class Branded implements struct {
  declare readonly __brand: "branded";
  constructor(readonly value: string) {}
}
class Link implements struct {
  constructor(readonly value: number, readonly next: Link | undefined) {}
}
class Session {
  constructor(readonly id: string) {}
}
class Pair<T> implements struct {
  constructor(readonly first: T, readonly second: T) {}
}
class Tagged implements struct {
  set tags(value: number[]) {}
  get tags(): number[] { return []; }
}
class Nest<T> implements struct {
  constructor(readonly value: T, readonly next: Nest<[T]> | undefined) {}
}
declare const point: Point;
declare const branded: Branded;
declare const link: Link;
declare const session: Session;
declare const maybePoint: Point | undefined;
declare const nothing: undefined;
declare const entry: [string, number[]];
declare const count: number;
declare const tagPair: Pair<string[]>;
declare const tagged: Tagged;
declare const nest: Nest<number>;
`);

  after(() => harness.cleanup());

  const factory = createTypeRefFactory(harness.checker);
  const refOf = (name: string) => factory.get(getDeclaredType(harness, name));

  it("should return the same TypeRef for the same type", () => {
    expect(refOf("point")).to.equal(refOf("point"));
  });

  it("should name types the way the checker prints them", () => {
    expect(refOf("point").displayName).to.equal("Point");
    expect(refOf("entry").displayName).to.equal("[string, number[]]");
  });

  describe("Members", () => {
    it("should list instance fields, parameter properties and getters", () => {
      const members = refOf("point")
        .members()
        .map((m) => [m.name, m.type.displayName]);
      expect(members).to.deep.equal([
        ["scale", "number"],
        ["x", "number"],
        ["y", "number"],
        ["length", "number"],
      ]);
    });

    it("should instantiate the members of a generic struct", () => {
      const members = refOf("tagPair")
        .members()
        .map((m) => [m.name, m.type.displayName]);
      expect(members).to.deep.equal([
        ["first", "string[]"],
        ["second", "string[]"],
      ]);
    });

    it("should list an accessor whose setter is declared first", () => {
      const members = refOf("tagged")
        .members()
        .map((m) => [m.name, m.type.displayName]);
      expect(members).to.deep.equal([["tags", "number[]"]]);
    });

    it("should skip the brand property", () => {
      expect(refOf("branded").members().map((m) => m.name)).to.deep.equal([
        "value",
      ]);
    });

    it("should list no members for reference composites", () => {
      expect(refOf("session").members()).to.deep.equal([]);
    });

    it("should list tuple elements as Item1..N", () => {
      const elements = refOf("entry")
        .tupleElements()
        .map((m) => [m.name, m.type.displayName]);
      expect(elements).to.deep.equal([
        ["Item1", "string"],
        ["Item2", "number[]"],
      ]);
    });
  });

  describe("Nullable wrappers", () => {
    it("should unwrap T | undefined to T", () => {
      const ref = refOf("maybePoint");
      expect(ref.isNullableValueWrapper).to.equal(true);
      expect(ref.unwrap()).to.equal(refOf("point"));
    });

    it("should unwrap undefined to nothing", () => {
      const ref = refOf("nothing");
      expect(ref.isNullableValueWrapper).to.equal(true);
      expect(ref.unwrap()).to.equal(undefined);
    });

    it("should not unwrap other types", () => {
      expect(refOf("count").isNullableValueWrapper).to.equal(false);
      expect(refOf("count").unwrap()).to.equal(undefined);
    });
  });

  describe("Classification", () => {
    it("should classify a self-referencing struct as ok", () => {
      expect(classifyMember(refOf("link"))).to.deep.equal(okVerdict);
    });

    it("should classify a struct that nests its own instantiations as ok", () => {
      expect(classifyMember(refOf("nest"))).to.deep.equal(okVerdict);
      expect(classifyMember(refOf("nest"), "path")).to.deep.equal(okVerdict);
    });

    it("should fold deep instantiations of one generic into an ancestor", () => {
      const nextOf = (ref: TypeRef): TypeRef | undefined =>
        ref.members().find((m) => m.name === "next")?.type.unwrap();

      const second = nextOf(refOf("nest"));
      const third = second && nextOf(second);
      const fourth = third && nextOf(third);

      expect(second?.displayName).to.equal("Nest<[number]>");
      expect(third?.displayName).to.equal("Nest<[[number]]>");
      expect(fourth).to.equal(third);
    });

    it("should report the first failing tuple element", () => {
      expect(classifyMember(refOf("entry"))).to.deep.equal({
        kind: "nestedFailed",
        innerTypeName: "number[]",
      });
    });
  });
});
