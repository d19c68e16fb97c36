import { analyze as analyzeInner, scratchVar } from "./analyzer";
import { ErrorCodes, SemanticError } from "./errors";
import {
  binary_,
  call_,
  callFunc_,
  func_,
  if_,
  print_,
  println_,
  program_,
  return_,
  store_,
  var_,
} from "./ir";
import { lex } from "./lexer";
import { parse } from "./parser";

const analyze = (code: string) => analyzeInner(parse(lex(code)));

function thrown(run: () => unknown): unknown {
  try {
    run();
  } catch (error) {
    return error;
  }
  throw new Error("expected an error");
}

it("lowers lets with flat evaluation order", () => {
  const ir = analyze(`
    func main(): int {
      let x: int = 1 + 2 * 3;
      return x;
    }
  `);
  expect(ir).toEqual(
    program_([
      func_("main", [], "int", [
        store_("x", binary_(binary_(1n, "+", 2n), "*", 3n)),
        return_(var_("x")),
      ]),
    ])
  );
});

it("lowers builtin calls, user calls and discarded expressions", () => {
  const ir = analyze(`
    func helper(n: int): int { return n; }
    func main(): int {
      println("hi");
      print("there");
      helper(1);
      1 + 2;
      return helper(2);
    }
  `);
  expect(ir.functions[1].body).toEqual([
    println_("hi"),
    print_("there"),
    callFunc_("helper", [1n]),
    store_(scratchVar, binary_(1n, "+", 2n)),
    return_(call_("helper", [2n])),
  ]);
});

it("types string concatenation as a string", () => {
  const ir = analyze(`
    func main(): int {
      let s: string = "a" + "b";
      println(s + "!");
      return 0;
    }
  `);
  expect(ir.functions[0].body).toEqual([
    store_("s", binary_("a", "+", "b", "string")),
    println_(binary_(var_("s"), "+", "!", "string")),
    return_(0n),
  ]);
});

it("lowers if statements", () => {
  const ir = analyze(`
    func main(): int {
      let x: int = 3;
      if x > 2 { println("big"); } else { println("small"); }
      return 0;
    }
  `);
  expect(ir.functions[0].body[1]).toEqual(
    if_(
      binary_(var_("x"), ">", 2n),
      [println_("big")],
      [println_("small")]
    )
  );
});

it("preserves function order and keeps parameters", () => {
  const ir = analyze(`
    func main(): int { return add(1, 2); }
    func add(a: int, b: int): int { return a + b; }
  `);
  expect(ir.functions.map((func) => func.name)).toEqual(["main", "add"]);
  expect(ir.functions[1]).toEqual(
    func_(
      "add",
      [
        { name: "a", type: "int" },
        { name: "b", type: "int" },
      ],
      "int",
      [return_(binary_(var_("a"), "+", var_("b")))]
    )
  );
});

it("allows recursion", () => {
  const ir = analyze(`
    func count(n: int): int {
      if n == 0 { return 0; } else { return count(n - 1); }
    }
    func main(): int { return count(3); }
  `);
  expect(ir.functions).toHaveLength(2);
});

it("keeps a let from a branch visible after the if", () => {
  const ir = analyze(`
    func main(): int {
      if 1 { let y: int = 2; } else { let y: int = 3; }
      return y;
    }
  `);
  expect(ir.functions[0].body[1]).toEqual(return_(var_("y")));
});

it("lets a redeclaration change a name's type", () => {
  const ir = analyze(`
    func main(): int {
      let x: int = 1;
      let x: string = "one";
      println(x);
      return 0;
    }
  `);
  expect(ir.functions[0].body[2]).toEqual(println_(var_("x")));
});

it("rejects a let with the wrong type", () => {
  const error = thrown(() =>
    analyze(`func main(): int { let s: string = 1; return 0; }`)
  );
  expect(error).toBeInstanceOf(SemanticError);
  expect(error).toMatchObject({
    stage: "semantic",
    code: ErrorCodes.LetTypeMismatch,
    message: "let 's' expected string, received int",
    line: 1,
    col: 20,
  });
});

it("rejects unknown functions", () => {
  expect(
    thrown(() => analyze(`func main(): int { foo(); return 0; }`))
  ).toMatchObject({
    code: ErrorCodes.UnknownFunction,
    message: "unknown function 'foo'",
    line: 1,
    col: 20,
  });
});

it("rejects unknown variables", () => {
  expect(
    thrown(() => analyze(`func main(): int { return y; }`))
  ).toMatchObject({
    code: ErrorCodes.UnknownVariable,
    message: "unknown variable 'y'",
  });
});

it("rejects a variable used before its let", () => {
  expect(
    thrown(() =>
      analyze(`func main(): int { let a: int = b; let b: int = 1; return a; }`)
    )
  ).toMatchObject({ code: ErrorCodes.UnknownVariable });
});

it("checks call arity and argument types", () => {
  const add = `func add(a: int, b: int): int { return a + b; }`;
  expect(
    thrown(() => analyze(`${add} func main(): int { return add(1); }`))
  ).toMatchObject({
    code: ErrorCodes.ArityMismatch,
    message: "'add' expected 2 arguments, received 1",
  });
  expect(
    thrown(() => analyze(`${add} func main(): int { return add(1, "x"); }`))
  ).toMatchObject({
    code: ErrorCodes.ArgumentTypeMismatch,
    message: "argument 2 of 'add' expected int, received string",
  });
});

it("requires an int condition", () => {
  expect(
    thrown(() =>
      analyze(`func main(): int { if "s" { } else { } return 0; }`)
    )
  ).toMatchObject({
    code: ErrorCodes.ConditionNotInt,
    message: "if condition expected int, received string",
  });
});

it("checks return types", () => {
  expect(
    thrown(() => analyze(`func main(): int { return "s"; }`))
  ).toMatchObject({
    code: ErrorCodes.ReturnTypeMismatch,
    message: "return in 'main' expected int, received string",
  });
});

it("checks operand types", () => {
  expect(
    thrown(() => analyze(`func main(): int { "a" - "b"; return 0; }`))
  ).toMatchObject({
    code: ErrorCodes.OperandTypeMismatch,
    message: "operator '-' expected int operands, received string and string",
  });
  expect(
    thrown(() => analyze(`func main(): int { return 1 + "a"; }`))
  ).toMatchObject({
    message: "operator '+' expected int operands, received int and string",
  });
});

it("rejects builtins used as values", () => {
  expect(
    thrown(() =>
      analyze(`func main(): int { let x: int = println("a"); return x; }`)
    )
  ).toMatchObject({
    code: ErrorCodes.BuiltinAsValue,
    message:
      "builtin 'println' has no value and can only be called as a statement",
  });
});

it("checks builtin arguments", () => {
  expect(
    thrown(() => analyze(`func main(): int { println(1); return 0; }`))
  ).toMatchObject({
    code: ErrorCodes.BuiltinArgumentMismatch,
    message: "'println' expected string, received int",
  });
  expect(
    thrown(() => analyze(`func main(): int { print("a", "b"); return 0; }`))
  ).toMatchObject({
    code: ErrorCodes.BuiltinArgumentMismatch,
    message: "'print' expected 1 argument, received 2",
  });
});

it("rejects duplicate and reserved function names", () => {
  expect(
    thrown(() =>
      analyze(`func f(): int { return 1; } func f(): int { return 2; }`)
    )
  ).toMatchObject({
    code: ErrorCodes.DuplicateFunction,
    message: "function 'f' is already defined",
  });
  expect(
    thrown(() => analyze(`func print(): int { return 1; }`))
  ).toMatchObject({
    code: ErrorCodes.ReservedFunctionName,
    message: "'print' is a builtin and cannot be redefined",
  });
});

it("rejects duplicate parameters", () => {
  expect(
    thrown(() => analyze(`func f(a: int, a: int): int { return a; }`))
  ).toMatchObject({
    code: ErrorCodes.DuplicateParameter,
    message: "duplicate parameter 'a' in 'f'",
  });
});

it("requires main to take no parameters and return int", () => {
  const error = thrown(() =>
    analyze(`func main(n: int): int { return n; }`)
  );
  expect(error).toBeInstanceOf(SemanticError);
  expect(error).toMatchObject({
    code: ErrorCodes.InvalidMainSignature,
    message: "'main' must take no parameters and return int",
    line: 1,
    col: 1,
  });
  expect(
    thrown(() => analyze(`func main(): string { return "x"; }`))
  ).toMatchObject({ code: ErrorCodes.InvalidMainSignature });
});
