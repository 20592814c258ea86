/**
 * Adapter from a graphql-js GraphQLSchema to the normalized SchemaModel.
 *
 * Built-in scalars and introspection types are dropped here; root operation
 * types are kept in `types` and listed in `rootTypeNames` so the emitter
 * applies its own exclusion rule.
 */

import {
  getNamedType,
  isEnumType,
  isInputObjectType,
  isInterfaceType,
  isIntrospectionType,
  isListType,
  isNonNullType,
  isObjectType,
  isScalarType,
  isSpecifiedScalarType,
  isUnionType,
} from "graphql";
import type { GraphQLSchema, GraphQLType } from "graphql";
import type { FieldDefinition, SchemaModel, TypeDefinition, TypeModifier, TypeSignature } from "../types/schema";

export function typeSignatureOf(type: GraphQLType): TypeSignature {
  const outerFirst: TypeModifier[] = [];
  let current: GraphQLType = type;
  for (;;) {
    if (isNonNullType(current)) {
      outerFirst.push("NON_NULL");
      current = current.ofType;
    } else if (isListType(current)) {
      outerFirst.push("LIST");
      current = current.ofType;
    } else {
      break;
    }
  }
  return { baseTypeName: getNamedType(type).name, modifiers: outerFirst.reverse() };
}

function toFieldDefinitions(
  ownerTypeName: string,
  fields: ReadonlyArray<{ name: string; type: GraphQLType }>,
): FieldDefinition[] {
  return fields.map((field) => ({
    name: field.name,
    ownerTypeName,
    type: typeSignatureOf(field.type),
  }));
}

function descriptionOf(value: { description?: string | null }): string | undefined {
  return value.description ?? undefined;
}

export function toSchemaModel(schema: GraphQLSchema): SchemaModel {
  const rootTypeNames = [schema.getQueryType(), schema.getMutationType(), schema.getSubscriptionType()].flatMap(
    (root) => (root ? [root.name] : []),
  );

  const types: TypeDefinition[] = [];
  for (const named of Object.values(schema.getTypeMap())) {
    if (isIntrospectionType(named) || isSpecifiedScalarType(named)) continue;
    const description = descriptionOf(named);

    if (isObjectType(named) || isInterfaceType(named) || isInputObjectType(named)) {
      types.push({
        kind: isObjectType(named) ? "Object" : isInterfaceType(named) ? "Interface" : "InputObject",
        name: named.name,
        description,
        fields: toFieldDefinitions(named.name, Object.values(named.getFields())),
      });
    } else if (isUnionType(named)) {
      types.push({
        kind: "Union",
        name: named.name,
        description,
        memberTypeNames: named.getTypes().map((member) => member.name),
      });
    } else if (isEnumType(named)) {
      types.push({
        kind: "Enum",
        name: named.name,
        description,
        values: named.getValues().map((value) => ({ name: value.name, ownerEnumName: named.name })),
      });
    } else if (isScalarType(named)) {
      types.push({ kind: "Scalar", name: named.name, description });
    }
  }

  return { types, rootTypeNames };
}
