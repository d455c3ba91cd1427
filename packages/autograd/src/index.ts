export { Node, backward, type BackwardOptions } from "./node.js";
export { Operation, GradSum, asNode, type Input, type Gradients, type OutputMeta } from "./operation.js";
export {
  getConfig, configure, resetConfig, configFromEnv,
  usingConfig, noGrad, evalMode,
  getBackend, useBackend, usingBackend,
  type ModeFlag,
} from "./config.js";
export {
  add, sub, rsub, mul, div, rdiv, neg, pow, square,
  exp, log, sin, cos, tanh,
} from "./functions/math.js";
export {
  reshape, transpose, matrixTranspose,
  sum, broadcastTo, sumTo,
  matmul, linear,
  max, min,
  getItem, getItemGrad,
} from "./functions/tensor.js";
export { sigmoid, relu, softmax } from "./functions/activations.js";
export { meanSquaredError, softmaxCrossEntropy } from "./functions/losses.js";
export {
  conv2d, deconv2d, conv2dGradW,
  im2col, col2im,
  pooling,
} from "./functions/conv.js";
export { dropout } from "./functions/dropout.js";
export { Parameter, Module, type StateDict } from "./module.js";
export { traceGraph, type GraphSnapshot, type NodeInfo, type OperationInfo } from "./graph.js";
export {
  numericalDiff, gradientCheck,
  type GradientCheckOptions, type GradientCheckReport, type InputGradientCheck,
} from "./gradcheck.js";
export { runBackward, checkGradients, type EngineError } from "./effects.js";
