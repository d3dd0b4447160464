export const INJECT_METADATA = Symbol.for("argwire:inject");
export const ANNOTATIONS_METADATA = Symbol.for("argwire:annotations");
