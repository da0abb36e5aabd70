import { describe, it } from "mocha";
import { expect } from "chai";
import {
  failedVerdict,
  isOkVerdict,
  nestedFailed,
  okVerdict,
} from "./verdict.js";

describe("verdict", () => {
  it("recognizes the ok verdict", () => {
    expect(isOkVerdict(okVerdict)).to.equal(true);
  });

  it("does not take failures for ok", () => {
    expect(isOkVerdict(failedVerdict)).to.equal(false);
    expect(isOkVerdict(nestedFailed("int[]"))).to.equal(false);
  });

  it("names the immediate failing child of a nested failure", () => {
    expect(nestedFailed("int[]")).to.deep.equal({
      kind: "nestedFailed",
      innerTypeName: "int[]",
    });
  });
});
