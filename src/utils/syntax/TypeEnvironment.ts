import { SourceKind } from '../../types/model';
import { Expression, MethodSource } from '../../types/syntax';
import { JavaTypes } from './JavaTypes';
import { stripParens, walkStatement } from './SyntaxQueries';

export enum BindingOrigin {
  LOCAL = 'LOCAL',
  PARAMETER = 'PARAMETER',
  FIELD = 'FIELD'
}

export interface VariableInfo {
  name: string;
  typeName: string;
  origin: BindingOrigin;
  isFinal: boolean;
  annotations: string[];
  initializer?: Expression;
}

export interface ResolvedSource {
  kind: SourceKind;
  elementTypeName?: string;
}

const NON_NULL_ANNOTATIONS = new Set(['NonNull', 'NotNull', 'Nonnull']);

/**
 * Name and type lookup for one method: parameters and locals shadow fields.
 * Locals are collected from the whole body; the first declaration of a name wins.
 */
export class TypeEnvironment {
  private readonly variables = new Map<string, VariableInfo>();
  private readonly fields = new Map<string, VariableInfo>();

  constructor(method: MethodSource) {
    for (const fieldBinding of method.fields ?? []) {
      const info: VariableInfo = {
        name: fieldBinding.name,
        typeName: fieldBinding.typeName,
        origin: BindingOrigin.FIELD,
        isFinal: fieldBinding.isFinal ?? false,
        annotations: fieldBinding.annotations ?? []
      };
      if (fieldBinding.initializer) info.initializer = fieldBinding.initializer;
      this.fields.set(fieldBinding.name, info);
    }
    for (const parameter of method.parameters ?? []) {
      this.define({
        name: parameter.name,
        typeName: parameter.typeName,
        origin: BindingOrigin.PARAMETER,
        isFinal: parameter.isFinal ?? false,
        annotations: parameter.annotations ?? []
      });
    }
    walkStatement(method.body, {
      statement: statement => {
        if (statement.kind === 'declaration') {
          const info: VariableInfo = {
            name: statement.name,
            typeName: statement.typeName,
            origin: BindingOrigin.LOCAL,
            isFinal: statement.isFinal ?? false,
            annotations: statement.annotations ?? []
          };
          if (statement.initializer) info.initializer = statement.initializer;
          this.define(info);
        } else if (statement.kind === 'forEach') {
          this.define({
            name: statement.element.name,
            typeName: statement.element.typeName,
            origin: BindingOrigin.LOCAL,
            isFinal: statement.element.isFinal ?? false,
            annotations: statement.element.annotations ?? []
          });
        } else if (statement.kind === 'for' && statement.initializer) {
          this.define({
            name: statement.initializer.name,
            typeName: statement.initializer.typeName,
            origin: BindingOrigin.LOCAL,
            isFinal: false,
            annotations: []
          });
        } else if (statement.kind === 'try') {
          statement.catches.forEach(clause => this.define({
            name: clause.name,
            typeName: clause.exceptionType,
            origin: BindingOrigin.LOCAL,
            isFinal: false,
            annotations: []
          }));
        }
      }
    }, { enterLambdas: false });
  }

  lookup(variableName: string): VariableInfo | undefined {
    return this.variables.get(variableName) ?? this.fields.get(variableName);
  }

  lookupField(fieldName: string): VariableInfo | undefined {
    return this.fields.get(fieldName);
  }

  /** Binding behind a plain name or `this.name` expression. */
  bindingOf(expression: Expression): VariableInfo | undefined {
    const stripped = stripParens(expression);
    if (stripped.kind === 'name') return this.lookup(stripped.identifier);
    if (stripped.kind === 'field' && stripped.receiver.kind === 'this') return this.lookupField(stripped.name);
    return undefined;
  }

  isNonNullAnnotated(variableName: string): boolean {
    const info = this.lookup(variableName);
    return info !== undefined && info.annotations.some(annotation => NON_NULL_ANNOTATIONS.has(annotation.replace(/^@/, '')));
  }

  typeOf(expression: Expression): string | undefined {
    if (expression.type !== undefined) return expression.type;
    switch (expression.kind) {
      case 'name':
        return this.lookup(expression.identifier)?.typeName;
      case 'field':
        return expression.receiver.kind === 'this' ? this.lookupField(expression.name)?.typeName : undefined;
      case 'literal':
        return literalType(expression.literalKind, expression.value);
      case 'paren':
        return this.typeOf(expression.expression);
      case 'cast':
        return expression.typeName;
      case 'new':
        return expression.typeName;
      case 'conditional':
        return this.typeOf(expression.whenTrue) ?? this.typeOf(expression.whenFalse);
      case 'unary':
        return expression.operator === '!' ? 'boolean' : this.typeOf(expression.operand);
      case 'postfix':
        return this.typeOf(expression.operand);
      case 'assign':
        return this.typeOf(expression.target);
      case 'binary':
        return this.binaryType(expression.operator, expression.left, expression.right);
      case 'call':
        if (expression.method === 'toString' || (expression.method === 'valueOf' && isNamed(expression.receiver, 'String'))) {
          return 'String';
        }
        return undefined;
      default:
        return undefined;
    }
  }

  /** Source kind and element type of an iterated expression, `undefined` when unsupported. */
  resolveSource(expression: Expression): ResolvedSource | undefined {
    const typeName = this.typeOf(expression);
    if (typeName === undefined) return undefined;
    const kind = JavaTypes.sourceKindOf(typeName);
    if (kind === undefined) return undefined;
    const elementTypeName = JavaTypes.elementTypeOf(typeName);
    return elementTypeName === undefined ? { kind } : { kind, elementTypeName };
  }

  private define(info: VariableInfo): void {
    if (!this.variables.has(info.name)) {
      this.variables.set(info.name, info);
    }
  }

  private binaryType(operator: string, left: Expression, right: Expression): string | undefined {
    if (['==', '!=', '<', '>', '<=', '>=', '&&', '||', 'instanceof'].includes(operator)) return 'boolean';
    const leftType = this.typeOf(left);
    const rightType = this.typeOf(right);
    if (operator === '+' && (JavaTypes.isStringType(leftType) || JavaTypes.isStringType(rightType))) return 'String';
    const categories = [JavaTypes.numericCategory(leftType), JavaTypes.numericCategory(rightType)];
    for (const widest of ['double', 'float', 'long'] as const) {
      if (categories.includes(widest)) return widest;
    }
    return categories.some(category => category !== undefined) ? 'int' : undefined;
  }
}

function isNamed(expression: Expression | undefined, identifier: string): boolean {
  return expression !== undefined && expression.kind === 'name' && expression.identifier === identifier;
}

function literalType(kind: string, value: string): string | undefined {
  switch (kind) {
    case 'string':
      return 'String';
    case 'char':
      return 'char';
    case 'boolean':
      return 'boolean';
    case 'number': {
      if (/[lL]$/.test(value)) return 'long';
      if (/[fF]$/.test(value)) return 'float';
      if (/[dD]$/.test(value) || (/[.eE]/.test(value) && !/^0[xX]/.test(value))) return 'double';
      return 'int';
    }
    default:
      return undefined;
  }
}
