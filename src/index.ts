export { Field } from "./field/field";
export { FieldError, ConstructionError, DimensionMismatchError, OutOfBoundsError } from "./field/errors";
export type { IField, Visitor, Dimensions } from "./types/field-types";
export * from "./constants";
