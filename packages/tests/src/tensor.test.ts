import { describe, it, expect } from "vitest";
import { CpuRefBackend, backendRegistry } from "@rungrad/tensor";
import { BackendRegistry, ConfigError, ShapeError, slice, take } from "@rungrad/core";

describe("CpuRefBackend", () => {
  const B = new CpuRefBackend();

  it("zeros", () => {
    const t = B.zeros([2, 3]);
    expect(t.shape).toEqual([2, 3]);
    expect(t.dtype).toBe("f32");
    expect(Array.from(t.data)).toEqual([0, 0, 0, 0, 0, 0]);
  });

  it("ones in f64", () => {
    const t = B.ones([3], "f64");
    expect(t.data).toBeInstanceOf(Float64Array);
    expect(Array.from(t.data)).toEqual([1, 1, 1]);
  });

  it("fromArray rejects a length that does not match the shape", () => {
    expect(() => B.fromArray([1, 2, 3], [2, 2])).toThrow(ShapeError);
  });

  it("add broadcasts a row over a matrix", () => {
    const a = B.fromArray([1, 2, 3, 4, 5, 6], [2, 3]);
    const b = B.fromArray([10, 20, 30], [3]);
    const c = B.add(a, b);
    expect(c.shape).toEqual([2, 3]);
    expect(Array.from(c.data)).toEqual([11, 22, 33, 14, 25, 36]);
  });

  it("add rejects incompatible shapes", () => {
    expect(() => B.add(B.zeros([2, 3]), B.zeros([2]))).toThrow(ShapeError);
  });

  it("sum over one axis, negative axis and keepdims", () => {
    const a = B.fromArray([1, 2, 3, 4, 5, 6], [2, 3]);
    expect(Array.from(B.sum(a, 0).data)).toEqual([5, 7, 9]);
    expect(Array.from(B.sum(a, -1).data)).toEqual([6, 15]);
    expect(B.sum(a, 1, true).shape).toEqual([2, 1]);
    const all = B.sum(a);
    expect(all.shape).toEqual([]);
    expect(Array.from(all.data)).toEqual([21]);
  });

  it("sumTo collapses leading and size-1 axes", () => {
    const a = B.fromArray([1, 2, 3, 4, 5, 6], [2, 3]);
    const r = B.sumTo(a, [1, 3]);
    expect(r.shape).toEqual([1, 3]);
    expect(Array.from(r.data)).toEqual([5, 7, 9]);
    expect(Array.from(B.sumTo(a, [3]).data)).toEqual([5, 7, 9]);
    expect(Array.from(B.sumTo(a, []).data)).toEqual([21]);
  });

  it("broadcastTo repeats a row", () => {
    const r = B.broadcastTo(B.fromArray([1, 2], [2]), [3, 2]);
    expect(Array.from(r.data)).toEqual([1, 2, 1, 2, 1, 2]);
  });

  it("permute reverses axes by default", () => {
    const a = B.fromArray([1, 2, 3, 4, 5, 6], [2, 3]);
    const t = B.permute(a);
    expect(t.shape).toEqual([3, 2]);
    expect(Array.from(t.data)).toEqual([1, 4, 2, 5, 3, 6]);
  });

  it("reshape infers one dimension", () => {
    const a = B.fromArray([1, 2, 3, 4, 5, 6], [2, 3]);
    expect(B.reshape(a, [3, -1]).shape).toEqual([3, 2]);
    expect(() => B.reshape(a, [4, 2])).toThrow(ShapeError);
  });

  it("matmul 2x2", () => {
    // [[1,2],[3,4]] @ [[5,6],[7,8]] = [[19,22],[43,50]]
    const a = B.fromArray([1, 2, 3, 4], [2, 2]);
    const b = B.fromArray([5, 6, 7, 8], [2, 2]);
    const c = B.matmul(a, b);
    expect(c.shape).toEqual([2, 2]);
    expect(Array.from(c.data)).toEqual([19, 22, 43, 50]);
  });

  it("matmul with a vector on the left drops the promoted axis", () => {
    const v = B.fromArray([1, 2], [2]);
    const m = B.fromArray([1, 2, 3, 4], [2, 2]);
    const r = B.matmul(v, m);
    expect(r.shape).toEqual([2]);
    expect(Array.from(r.data)).toEqual([7, 10]);
  });

  it("matmul rejects mismatched inner dimensions", () => {
    expect(() => B.matmul(B.zeros([2, 3]), B.zeros([2, 3]))).toThrow(ShapeError);
  });

  it("max and argmax along an axis", () => {
    const a = B.fromArray([1, 5, 3, 9, 2, 4], [2, 3]);
    expect(Array.from(B.max(a, 1).data)).toEqual([5, 9]);
    expect(Array.from(B.min(a, 0).data)).toEqual([1, 2, 3]);
    const idx = B.argmax(a, 1);
    expect(idx.dtype).toBe("i32");
    expect(Array.from(idx.data)).toEqual([1, 0]);
  });

  it("logsumexp keeps the reduced axis", () => {
    const r = B.logsumexp(B.zeros([1, 2], "f64"), 1);
    expect(r.shape).toEqual([1, 1]);
    expect(r.data[0]).toBeCloseTo(Math.log(2), 12);
  });

  it("equal and greater produce float masks", () => {
    const a = B.fromArray([1, 2, 3], [3]);
    const b = B.fromArray([1, 0, 4], [3]);
    expect(Array.from(B.equal(a, b).data)).toEqual([1, 0, 0]);
    expect(Array.from(B.greater(a, b).data)).toEqual([0, 1, 0]);
  });

  it("select with a slice and an index list", () => {
    const a = B.fromArray([1, 2, 3, 4, 5, 6], [2, 3]);
    const r = B.select(a, [slice(), take([2, 0])]);
    expect(r.shape).toEqual([2, 2]);
    expect(Array.from(r.data)).toEqual([3, 1, 6, 4]);
  });

  it("select with an integer drops the axis", () => {
    const a = B.fromArray([1, 2, 3, 4, 5, 6], [2, 3]);
    const r = B.select(a, -1);
    expect(r.shape).toEqual([3]);
    expect(Array.from(r.data)).toEqual([4, 5, 6]);
  });

  it("select with a stepped slice", () => {
    const a = B.fromArray([0, 1, 2, 3, 4, 5], [6]);
    expect(Array.from(B.select(a, slice(1, undefined, 2)).data)).toEqual([1, 3, 5]);
  });

  it("select rejects an out-of-bounds index", () => {
    expect(() => B.select(B.zeros([3]), 3)).toThrow(ShapeError);
  });

  it("scatterAdd accumulates repeated positions", () => {
    const v = B.fromArray([1, 2, 3], [3]);
    const r = B.scatterAdd([3], take([0, 0, 2]), v);
    expect(Array.from(r.data)).toEqual([3, 0, 3]);
  });

  it("oneHot", () => {
    const idx = B.fromArray([0, 2], [2], "i32");
    const r = B.oneHot(idx, 3);
    expect(r.shape).toEqual([2, 3]);
    expect(Array.from(r.data)).toEqual([1, 0, 0, 0, 0, 1]);
  });

  it("im2col unfolds 2x2 windows", () => {
    const x = B.fromArray([1, 2, 3, 4, 5, 6, 7, 8, 9], [1, 1, 3, 3]);
    const col = B.im2col(x, [2, 2], [1, 1], [0, 0]);
    expect(col.shape).toEqual([1, 1, 2, 2, 2, 2]);
    expect(Array.from(col.data)).toEqual([
      1, 2, 4, 5,
      2, 3, 5, 6,
      4, 5, 7, 8,
      5, 6, 8, 9,
    ]);
  });

  it("col2im sums overlapping windows", () => {
    const cols = B.ones([1, 1, 2, 2, 2, 2]);
    const img = B.col2im(cols, [1, 1, 3, 3], [2, 2], [1, 1], [0, 0]);
    expect(Array.from(img.data)).toEqual([1, 2, 1, 2, 4, 2, 1, 2, 1]);
  });

  it("seeded random streams repeat", () => {
    const a = new CpuRefBackend(7);
    const b = new CpuRefBackend(7);
    expect(Array.from(a.rand([4]).data)).toEqual(Array.from(b.rand([4]).data));
    a.seed(7);
    b.seed(7);
    expect(Array.from(a.randn([4]).data)).toEqual(Array.from(b.randn([4]).data));
  });

  it("allClose", () => {
    const a = B.fromArray([1, 2], [2], "f64");
    expect(B.allClose(a, B.fromArray([1, 2 + 1e-9], [2], "f64"))).toBe(true);
    expect(B.allClose(a, B.fromArray([1, 2.1], [2], "f64"))).toBe(false);
  });
});

describe("backendRegistry", () => {
  it("builds cpu_ref", () => {
    expect(backendRegistry.list()).toContain("cpu_ref");
    expect(backendRegistry.create("cpu_ref", 1).name).toBe("cpu_ref");
  });

  it("seeds each backend it builds", () => {
    const a = backendRegistry.create("cpu_ref", 5).randn([4], "f64");
    const b = backendRegistry.create("cpu_ref", 5).randn([4], "f64");
    expect(Array.from(a.data)).toEqual(Array.from(b.data));
  });

  it("rejects unknown names", () => {
    expect(() => backendRegistry.create("tpu", 1)).toThrow(ConfigError);
  });

  it("rejects a second factory under the same name", () => {
    const registry = new BackendRegistry().register("cpu_ref", (seed) => new CpuRefBackend(seed));
    expect(() => registry.register("cpu_ref", (seed) => new CpuRefBackend(seed))).toThrow(ConfigError);
  });
});
