/**
 * Instance state declared by a class
 */

import ts from "typescript";

/**
 * Declarations that hold instance state: property declarations,
 * constructor parameter properties and get accessors
 */
export type FieldDeclaration =
  | ts.PropertyDeclaration
  | ts.ParameterDeclaration
  | ts.GetAccessorDeclaration;

const isStatic = (node: ts.Declaration): boolean =>
  (ts.getCombinedModifierFlags(node) & ts.ModifierFlags.Static) !== 0;

/**
 * Branding property used by nominal marker patterns; never compared
 */
export const BRAND_PROPERTY = "__brand";

export const isFieldDeclaration = (
  node: ts.Declaration
): node is FieldDeclaration => {
  if (ts.isParameter(node)) {
    return ts.isParameterPropertyDeclaration(node, node.parent);
  }
  return (
    (ts.isPropertyDeclaration(node) || ts.isGetAccessorDeclaration(node)) &&
    !isStatic(node)
  );
};

/**
 * Fields of a class body in source order. Parameter properties are listed
 * where the constructor appears.
 */
export const getDeclaredFields = (
  node: ts.ClassLikeDeclaration
): readonly FieldDeclaration[] =>
  node.members.flatMap((member): readonly FieldDeclaration[] => {
    if (ts.isConstructorDeclaration(member)) {
      return member.parameters.filter(isFieldDeclaration);
    }
    if (!isFieldDeclaration(member)) {
      return [];
    }
    return getFieldName(member) === BRAND_PROPERTY ? [] : [member];
  });

export const getFieldName = (node: FieldDeclaration): string => {
  const name = node.name;
  if (
    ts.isIdentifier(name) ||
    ts.isPrivateIdentifier(name) ||
    ts.isStringLiteral(name)
  ) {
    return name.text;
  }
  return name.getText();
};
