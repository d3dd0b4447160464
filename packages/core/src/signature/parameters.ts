import { parse, type AnyNode, type MethodDefinition, type Pattern, type Program, type Property } from "acorn";
import createDebug from "debug";
import type { InjectOptions } from "@argwire/types";
import { InjectionPoint } from "../injection-point";
import { InvalidMarkerError } from "../errors";

const debug = createDebug("argwire:core:inspector");

/** Name of the marker function recognised in parameter defaults. */
export const MARKER_FUNCTION = "inject";

export type ParameterKind = "required" | "optional" | "rest" | "pattern";

export type ParameterInfo = {
  /** `null` for destructured parameters. */
  name: string | null;
  index: number;
  kind: ParameterKind;
  /** Injection point written as the parameter's default value. */
  marker?: InjectionPoint;
};

export type SourceShape =
  | { type: "function"; params: Pattern[] }
  | { type: "class"; constructorParams: Pattern[] | null; derived: boolean };

/**
 * Parses the text returned by `Function.prototype.toString`. Returns `null` for
 * sources that are not JavaScript (native and bound functions).
 */
export function parseCallableSource(source: string): SourceShape | null {
  // Method shorthand is only valid inside an object literal.
  const expression =
    firstExpression(parseProgram(`(${source}\n)`)) ??
    methodValue(firstExpression(parseProgram(`({${source}\n})`)));
  if (!expression) return null;

  switch (expression.type) {
    case "FunctionExpression":
    case "ArrowFunctionExpression":
      return { type: "function", params: expression.params };
    case "ClassExpression": {
      const ctor = expression.body.body.find(
        (member): member is MethodDefinition =>
          member.type === "MethodDefinition" && member.kind === "constructor",
      );
      return {
        type: "class",
        constructorParams: ctor ? ctor.value.params : null,
        derived: expression.superClass !== null && expression.superClass !== undefined,
      };
    }
    default:
      return null;
  }
}

export function toParameters(params: readonly Pattern[]): ParameterInfo[] {
  return params.map((param, index) => describeParameter(param, index));
}

function describeParameter(param: Pattern, index: number): ParameterInfo {
  switch (param.type) {
    case "Identifier":
      return { name: param.name, index, kind: "required" };
    case "RestElement":
      return {
        name: param.argument.type === "Identifier" ? param.argument.name : null,
        index,
        kind: "rest",
      };
    case "AssignmentPattern": {
      if (param.left.type !== "Identifier") return { name: null, index, kind: "optional" };
      const name = param.left.name;
      return { name, index, kind: "optional", marker: readMarker(name, param.right) };
    }
    default:
      return { name: null, index, kind: "pattern" };
  }
}

function parseProgram(source: string): Program | null {
  try {
    return parse(source, { ecmaVersion: "latest" });
  } catch (error) {
    if (!(error instanceof SyntaxError)) throw error;
    debug("unparseable source: %s", error.message);
    return null;
  }
}

function firstExpression(program: Program | null): AnyNode | null {
  const statement = program?.body[0];
  if (program?.body.length !== 1 || statement?.type !== "ExpressionStatement") return null;
  return statement.expression;
}

function methodValue(node: AnyNode | null): AnyNode | null {
  if (node?.type !== "ObjectExpression") return null;
  const [property] = node.properties;
  if (property?.type !== "Property" || property.value.type !== "FunctionExpression") return null;
  return property.value;
}

function readMarker(parameter: string, node: AnyNode): InjectionPoint | undefined {
  if (node.type !== "CallExpression" || !isMarkerCallee(node.callee)) return undefined;

  const [nameArg, optionsArg, ...rest] = node.arguments;
  if (nameArg === undefined || rest.length > 0) {
    throw new InvalidMarkerError(parameter, `expected ${MARKER_FUNCTION}(name, options?)`);
  }
  const name = literalValue(parameter, nameArg);
  if (typeof name !== "string") {
    throw new InvalidMarkerError(parameter, "the dependency name must be a string");
  }
  const options = optionsArg === undefined ? {} : literalValue(parameter, optionsArg);
  return new InjectionPoint(name, toInjectOptions(parameter, options));
}

// Matches `inject`, `ns.inject` and the `(0, ns.inject)` form emitted by transpilers.
function isMarkerCallee(node: AnyNode): boolean {
  switch (node.type) {
    case "Identifier":
      return node.name === MARKER_FUNCTION;
    case "MemberExpression":
      return (
        !node.computed &&
        node.property.type === "Identifier" &&
        node.property.name === MARKER_FUNCTION
      );
    case "SequenceExpression": {
      const last = node.expressions[node.expressions.length - 1];
      return last !== undefined && isMarkerCallee(last);
    }
    default:
      return false;
  }
}

function literalValue(parameter: string, node: AnyNode): unknown {
  switch (node.type) {
    case "Literal":
      return node.value;
    case "Identifier":
      if (node.name === "undefined") return undefined;
      if (node.name === "NaN") return Number.NaN;
      if (node.name === "Infinity") return Number.POSITIVE_INFINITY;
      break;
    case "UnaryExpression": {
      const value = literalValue(parameter, node.argument);
      if (typeof value === "number" && node.operator === "-") return -value;
      if (typeof value === "number" && node.operator === "+") return value;
      break;
    }
    case "TemplateLiteral":
      if (node.expressions.length === 0) return node.quasis[0]?.value.cooked ?? "";
      break;
    case "ArrayExpression":
      return node.elements.map((element) =>
        element === null ? undefined : literalValue(parameter, element),
      );
    case "ObjectExpression":
      return Object.fromEntries(
        node.properties.map((property) => {
          if (property.type !== "Property" || property.kind !== "init" || property.method) {
            throw new InvalidMarkerError(parameter, "options may only contain plain properties");
          }
          return [propertyKey(parameter, property), literalValue(parameter, property.value)];
        }),
      );
  }
  throw new InvalidMarkerError(parameter, `${node.type} is not a literal`);
}

function propertyKey(parameter: string, property: Property): string {
  const key = property.key;
  if (!property.computed && key.type === "Identifier") return key.name;
  if (key.type === "Literal" && (typeof key.value === "string" || typeof key.value === "number")) {
    return String(key.value);
  }
  throw new InvalidMarkerError(parameter, "option keys must be identifiers or literals");
}

function toInjectOptions(parameter: string, value: unknown): InjectOptions {
  if (!isRecord(value)) {
    throw new InvalidMarkerError(parameter, "options must be an object literal");
  }
  const { parameters, config } = value;
  if (parameters !== undefined && !Array.isArray(parameters)) {
    throw new InvalidMarkerError(parameter, "options.parameters must be an array");
  }
  if (config !== undefined && !isRecord(config)) {
    throw new InvalidMarkerError(parameter, "options.config must be an object");
  }
  return { parameters, config };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
