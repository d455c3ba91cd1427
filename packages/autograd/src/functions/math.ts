/**
 * Element-wise arithmetic and transcendental operations.
 *
 * Binary operations broadcast their operands; backward reduces each gradient
 * back to its operand's pre-broadcast shape.
 */
import type { Backend, Shape, TensorData } from "@rungrad/core";
import type { Node } from "../node.js";
import { Operation, type Gradients, type Input } from "../operation.js";
import { sumTo } from "./tensor.js";

/** Binary operation that records both operand shapes for the backward reduction. */
abstract class Broadcasting extends Operation {
  protected x0Shape: Shape = [];
  protected x1Shape: Shape = [];

  forward([a, b]: readonly TensorData[], B: Backend): TensorData {
    this.x0Shape = a.shape;
    this.x1Shape = b.shape;
    return this.compute(a, b, B);
  }

  protected abstract compute(a: TensorData, b: TensorData, B: Backend): TensorData;

  protected reduce(gx0: Node, gx1: Node): Gradients {
    return [sumTo(gx0, this.x0Shape), sumTo(gx1, this.x1Shape)];
  }
}

// ── Binary ─────────────────────────────────────────────────────────────────

class Add extends Broadcasting {
  readonly name = "Add";
  protected compute(a: TensorData, b: TensorData, B: Backend): TensorData {
    return B.add(a, b);
  }
  backward([gy]: readonly Node[]): Gradients {
    return this.reduce(gy, gy);
  }
}

class Sub extends Broadcasting {
  readonly name = "Sub";
  protected compute(a: TensorData, b: TensorData, B: Backend): TensorData {
    return B.sub(a, b);
  }
  backward([gy]: readonly Node[]): Gradients {
    return this.reduce(gy, neg(gy));
  }
}

class Mul extends Broadcasting {
  readonly name = "Mul";
  protected compute(a: TensorData, b: TensorData, B: Backend): TensorData {
    return B.mul(a, b);
  }
  backward([gy]: readonly Node[]): Gradients {
    const [x0, x1] = this.inputs;
    return this.reduce(mul(gy, x1), mul(gy, x0));
  }
}

class Div extends Broadcasting {
  readonly name = "Div";
  protected compute(a: TensorData, b: TensorData, B: Backend): TensorData {
    return B.div(a, b);
  }
  backward([gy]: readonly Node[]): Gradients {
    const [x0, x1] = this.inputs;
    return this.reduce(div(gy, x1), mul(gy, div(neg(x0), mul(x1, x1))));
  }
}

export function add(x0: Input, x1: Input): Node {
  return new Add().callOne(x0, x1);
}

export function sub(x0: Input, x1: Input): Node {
  return new Sub().callOne(x0, x1);
}

/** `x1 - x0`, for a left operand that is a constant. */
export function rsub(x0: Input, x1: Input): Node {
  return new Sub().callOne(x1, x0);
}

export function mul(x0: Input, x1: Input): Node {
  return new Mul().callOne(x0, x1);
}

export function div(x0: Input, x1: Input): Node {
  return new Div().callOne(x0, x1);
}

/** `x1 / x0`. */
export function rdiv(x0: Input, x1: Input): Node {
  return new Div().callOne(x1, x0);
}

// ── Unary ──────────────────────────────────────────────────────────────────

class Neg extends Operation {
  readonly name = "Neg";
  forward([x]: readonly TensorData[], B: Backend): TensorData {
    return B.neg(x);
  }
  backward([gy]: readonly Node[]): Gradients {
    return neg(gy);
  }
}

class Pow extends Operation {
  readonly name = "Pow";
  constructor(private readonly c: number) {
    super();
  }
  forward([x]: readonly TensorData[], B: Backend): TensorData {
    return B.pow(x, this.c);
  }
  backward([gy]: readonly Node[]): Gradients {
    const [x] = this.inputs;
    return mul(mul(pow(x, this.c - 1), this.c), gy);
  }
}

class Square extends Operation {
  readonly name = "Square";
  forward([x]: readonly TensorData[], B: Backend): TensorData {
    return B.mul(x, x);
  }
  backward([gy]: readonly Node[]): Gradients {
    const [x] = this.inputs;
    return mul(mul(x, 2), gy);
  }
}

class Exp extends Operation {
  readonly name = "Exp";
  forward([x]: readonly TensorData[], B: Backend): TensorData {
    return B.exp(x);
  }
  backward([gy]: readonly Node[]): Gradients {
    const y = this.output() ?? exp(this.inputs[0]);
    return mul(gy, y);
  }
}

class Log extends Operation {
  readonly name = "Log";
  forward([x]: readonly TensorData[], B: Backend): TensorData {
    return B.log(x);
  }
  backward([gy]: readonly Node[]): Gradients {
    return div(gy, this.inputs[0]);
  }
}

class Sin extends Operation {
  readonly name = "Sin";
  forward([x]: readonly TensorData[], B: Backend): TensorData {
    return B.sin(x);
  }
  backward([gy]: readonly Node[]): Gradients {
    return mul(gy, cos(this.inputs[0]));
  }
}

class Cos extends Operation {
  readonly name = "Cos";
  forward([x]: readonly TensorData[], B: Backend): TensorData {
    return B.cos(x);
  }
  backward([gy]: readonly Node[]): Gradients {
    return mul(gy, neg(sin(this.inputs[0])));
  }
}

class Tanh extends Operation {
  readonly name = "Tanh";
  forward([x]: readonly TensorData[], B: Backend): TensorData {
    return B.tanh(x);
  }
  backward([gy]: readonly Node[]): Gradients {
    const y = this.output() ?? tanh(this.inputs[0]);
    return mul(gy, rsub(mul(y, y), 1));
  }
}

export function neg(x: Input): Node {
  return new Neg().callOne(x);
}

/** `x ** c` for a constant exponent. */
export function pow(x: Input, c: number): Node {
  return new Pow(c).callOne(x);
}

export function square(x: Input): Node {
  return new Square().callOne(x);
}

export function exp(x: Input): Node {
  return new Exp().callOne(x);
}

export function log(x: Input): Node {
  return new Log().callOne(x);
}

export function sin(x: Input): Node {
  return new Sin().callOne(x);
}

export function cos(x: Input): Node {
  return new Cos().callOne(x);
}

export function tanh(x: Input): Node {
  return new Tanh().callOne(x);
}
