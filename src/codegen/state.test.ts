import { CodegenError, ErrorCodes } from "../errors";
import { func_, if_, store_, var_ } from "../ir";
import { Frame, InternedStringsState, LabelState } from "./state";

it("numbers labels across the whole run", () => {
  const labels = new LabelState(".L");
  expect(labels.create("return")).toEqual(".Lreturn_0");
  expect(labels.create("then")).toEqual(".Lthen_1");
  expect(labels.create("return")).toEqual(".Lreturn_2");
});

it("interns each string once", () => {
  const strings = new InternedStringsState();
  expect(strings.use("a")).toEqual("str_0");
  expect(strings.use("b")).toEqual("str_1");
  expect(strings.use("a")).toEqual("str_0");
  expect(strings.entries()).toEqual([
    { label: "str_0", value: "a" },
    { label: "str_1", value: "b" },
  ]);
});

it("gives parameters the first slots", () => {
  const frame = new Frame(
    func_(
      "add",
      [
        { name: "a", type: "int" },
        { name: "b", type: "int" },
      ],
      "int",
      [store_("sum", var_("a"))]
    )
  );
  expect(frame.offset("a")).toEqual(8);
  expect(frame.offset("b")).toEqual(16);
  expect(frame.offset("sum")).toEqual(24);
  expect(frame.size).toEqual(32);
});

it("shares one slot between sibling branches", () => {
  const frame = new Frame(
    func_("main", [], "int", [
      if_(1n, [store_("y", 1n)], [store_("y", 2n), store_("z", 3n)]),
      store_("y", 4n),
    ])
  );
  expect(frame.slotCount).toEqual(2);
  expect(frame.offset("y")).toEqual(8);
  expect(frame.offset("z")).toEqual(16);
  expect(frame.size).toEqual(16);
});

it("scans nested branches", () => {
  const frame = new Frame(
    func_("main", [], "int", [
      if_(1n, [if_(1n, [store_("deep", 1n)], [])], []),
    ])
  );
  expect(frame.offset("deep")).toEqual(8);
  expect(frame.size).toEqual(16);
});

it("reserves nothing for a function without names", () => {
  const frame = new Frame(func_("main", [], "int", []));
  expect(frame.slotCount).toEqual(0);
  expect(frame.size).toEqual(0);
});

it("fails on a name without a slot", () => {
  const frame = new Frame(func_("main", [], "int", []));
  expect(() => frame.offset("nope")).toThrowError(CodegenError);
  expect(() => frame.offset("nope")).toThrowError(
    "no stack slot for variable 'nope'"
  );
  try {
    frame.offset("nope");
  } catch (error) {
    expect(error).toMatchObject({ code: ErrorCodes.MissingSlot });
  }
});
