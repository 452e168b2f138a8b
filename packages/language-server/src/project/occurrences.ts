import type {
  Declaration,
  Definition,
  EnumBody,
  Identifier,
  Specification,
  StructBody,
  TypeSpecifier,
  UnionBody,
  Value,
} from "@xdr-lsp/parser";

/** One appearance of a name in a schema file. */
export type Occurrence = {
  id: Identifier;
  isDefinition: boolean;
};

/**
 * Names introduced into the global namespace are definitions: constants,
 * top-level enum/struct/union names, the declared name of a top-level
 * typedef, and every enum member. Everything else is recorded as a reference
 * keyed by its own text, struct and union field names included, so unrelated
 * fields that share a name land in the same bucket.
 */
export const occurrences = (specification: Specification): Iterable<Occurrence> => ({
  [Symbol.iterator]: () => visitSpecification(specification),
});

export const collectOccurrences = (specification: Specification): Occurrence[] =>
  Array.from(occurrences(specification));

const definitionOf = (id: Identifier): Occurrence => ({ id, isDefinition: true });
const referenceTo = (id: Identifier): Occurrence => ({ id, isDefinition: false });

function* visitSpecification(specification: Specification): Generator<Occurrence> {
  for (const definition of specification.definitions) {
    yield* visitDefinition(definition);
  }
}

function* visitDefinition(definition: Definition): Generator<Occurrence> {
  switch (definition.kind) {
    case "constant":
      yield definitionOf(definition.id);
      return;
    case "typedef":
      yield* visitDeclaration(definition.declaration, true);
      return;
    case "enum":
      yield definitionOf(definition.id);
      yield* visitEnumBody(definition.body);
      return;
    case "struct":
      yield definitionOf(definition.id);
      yield* visitStructBody(definition.body);
      return;
    case "union":
      yield definitionOf(definition.id);
      yield* visitUnionBody(definition.body);
      return;
  }
}

function* visitDeclaration(
  declaration: Declaration,
  isDefinition: boolean,
): Generator<Occurrence> {
  switch (declaration.kind) {
    case "plain":
    case "optional":
      yield* visitType(declaration.type);
      yield { id: declaration.id, isDefinition };
      return;
    case "fixed-array":
      yield* visitType(declaration.type);
      yield { id: declaration.id, isDefinition };
      yield* visitValue(declaration.size);
      return;
    case "variable-array":
      yield* visitType(declaration.type);
      yield { id: declaration.id, isDefinition };
      yield* visitValue(declaration.size);
      return;
    case "fixed-opaque":
    case "variable-opaque":
    case "string":
      yield { id: declaration.id, isDefinition };
      yield* visitValue(declaration.size);
      return;
    case "void":
      return;
  }
}

function* visitEnumBody(body: EnumBody): Generator<Occurrence> {
  for (const member of body.members) {
    yield definitionOf(member.id);
    yield* visitValue(member.value);
  }
}

function* visitStructBody(body: StructBody): Generator<Occurrence> {
  for (const declaration of body.declarations) {
    yield* visitDeclaration(declaration, false);
  }
}

function* visitUnionBody(body: UnionBody): Generator<Occurrence> {
  yield* visitDeclaration(body.discriminant, false);
  for (const unionCase of body.cases) {
    for (const value of unionCase.values) {
      yield* visitValue(value);
    }
    yield* visitDeclaration(unionCase.declaration, false);
  }
  if (body.defaultCase) {
    yield* visitDeclaration(body.defaultCase, false);
  }
}

function* visitValue(value: Value | undefined): Generator<Occurrence> {
  if (value?.kind === "identifier") {
    yield referenceTo(value.id);
  }
}

function* visitType(type: TypeSpecifier): Generator<Occurrence> {
  switch (type.kind) {
    case "builtin":
      return;
    case "enum":
      yield* visitEnumBody(type.body);
      return;
    case "struct":
      yield* visitStructBody(type.body);
      return;
    case "union":
      yield* visitUnionBody(type.body);
      return;
    case "named":
      yield referenceTo(type.id);
      return;
  }
}
