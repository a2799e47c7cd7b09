export type {
  Addable,
  Arithmetic,
  Capability,
  Comparable,
  Divisible,
  NumericDomain,
  NumericKind,
  Widenable,
} from "./capabilities.js";
export { hasCapability, requireCapability } from "./capabilities.js";

export type {
  BigIntArray,
  FloatingArray,
  FloatSequence,
  IntegralArray,
  NumberSequence,
  Sequence,
} from "./domains.js";
export { bigInt, float64, inferDomain, int } from "./domains.js";

export type { NumericErrorCode, Reduction } from "./errors.js";
export { EmptyInputError, NumericError, TypeIneligibleError, attempt } from "./errors.js";

export { max, mean, sum, transformReduce, variance } from "./reduce.js";

export type { NonEmpty, VariadicOperation } from "./variadic.js";
export { maxOf, meanOf, reduceArguments, sumOf, varianceOf } from "./variadic.js";
