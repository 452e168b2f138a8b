/** A name together with its `[start, end)` offsets in the source text. */
export type Identifier = {
  name: string;
  start: number;
  end: number;
};

/** Literal constants keep their source text; names point at another definition. */
export type Value =
  | { kind: "constant"; text: string }
  | { kind: "identifier"; id: Identifier };

export type BuiltinTypeName =
  | "int"
  | "unsigned int"
  | "unsigned"
  | "hyper"
  | "unsigned hyper"
  | "float"
  | "double"
  | "quadruple"
  | "bool";

export type TypeSpecifier =
  | { kind: "builtin"; name: BuiltinTypeName }
  | { kind: "enum"; body: EnumBody }
  | { kind: "struct"; body: StructBody }
  | { kind: "union"; body: UnionBody }
  | { kind: "named"; id: Identifier };

export type Declaration =
  | { kind: "plain"; type: TypeSpecifier; id: Identifier }
  | { kind: "fixed-array"; type: TypeSpecifier; id: Identifier; size: Value }
  | { kind: "variable-array"; type: TypeSpecifier; id: Identifier; size?: Value }
  | { kind: "fixed-opaque"; id: Identifier; size: Value }
  | { kind: "variable-opaque"; id: Identifier; size?: Value }
  | { kind: "string"; id: Identifier; size?: Value }
  | { kind: "optional"; type: TypeSpecifier; id: Identifier }
  | { kind: "void" };

export type EnumMember = {
  id: Identifier;
  value: Value;
};

export type EnumBody = {
  members: readonly EnumMember[];
};

export type StructBody = {
  declarations: readonly Declaration[];
};

export type UnionCase = {
  values: readonly Value[];
  declaration: Declaration;
};

export type UnionBody = {
  discriminant: Declaration;
  cases: readonly UnionCase[];
  defaultCase?: Declaration;
};

export type Definition =
  | { kind: "constant"; id: Identifier; value: string }
  | { kind: "typedef"; declaration: Declaration }
  | { kind: "enum"; id: Identifier; body: EnumBody }
  | { kind: "struct"; id: Identifier; body: StructBody }
  | { kind: "union"; id: Identifier; body: UnionBody };

/** One parsed schema file. */
export type Specification = {
  definitions: readonly Definition[];
};
