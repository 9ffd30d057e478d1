/**
 * Expression compiler - rewrites step expressions into PL/pgSQL.
 *
 * References understood outside quoted literals:
 *   input.<key>        -> (input_payload->>'<key>'), cast by context
 *   <Entity>.id        -> the entity's ID binding
 *   caller.id          -> auth_user_id
 *   caller.tenant_id   -> auth_tenant_id
 *   p_<name>           -> a declared function parameter
 * Everything else passes through unchanged once the safety checks pass.
 */
import type { Entity, FieldDefinition } from '../ast/types.js';
import type { BindingTable } from './binding-table.js';
import { castSuffix, toPgType } from './pg-types.js';
import {
  BindingError,
  ExpressionError,
  ErrorCodes,
  type CompileLocation,
} from '../../utils/errors.js';

export interface ExpressionScope {
  bindings: BindingTable;
  /** Declared parameter names (`p_*`) */
  parameters: ReadonlySet<string>;
  /** Entity whose columns bare identifiers name; drives input casts */
  target?: Entity;
  location: CompileLocation;
}

interface Segment {
  quoted: boolean;
  text: string;
}

/** Checked against expression text outside quoted literals. */
const DANGEROUS_PATTERNS: ReadonlyArray<{ pattern: RegExp; reason: string }> = [
  { pattern: /;/, reason: 'statement separator' },
  { pattern: /--/, reason: 'line comment' },
  { pattern: /\/\*/, reason: 'block comment' },
  { pattern: /\bunion\s+(all\s+)?select\b/i, reason: 'UNION SELECT' },
  { pattern: /\bexec(ute)?\s*\(/i, reason: 'dynamic execution' },
  { pattern: /\bxp_\w+/i, reason: 'extended procedure' },
  { pattern: /\bpg_sleep\b/i, reason: 'pg_sleep' },
];

const SUSPICIOUS_CHARACTERS = ['\\', '\0', '\n', '\r'];

const TOKEN = /[A-Za-z_][A-Za-z0-9_]*(?:\.[A-Za-z_][A-Za-z0-9_]*)?/g;
const COMPARISON_TAIL = /([A-Za-z_][A-Za-z0-9_]*)\s*(?:=|<>|!=|<=|>=|<|>)\s*$/;
const INPUT_ONLY = /^input\.([A-Za-z_][A-Za-z0-9_]*)$/;

export class ExpressionCompiler {
  /**
   * Compile a predicate or general expression.
   */
  compile(expression: string, scope: ExpressionScope): string {
    const source = expression.trim();
    if (source.length === 0) {
      throw new ExpressionError(ErrorCodes.MALFORMED_EXPRESSION, 'Empty expression', scope.location);
    }

    this.checkCharacters(source, scope);
    const segments = this.splitQuoted(source, scope);
    const code = segments.filter((s) => !s.quoted).map((s) => s.text).join(' ');
    this.checkPatterns(source, code, scope);
    this.checkParentheses(source, code, scope);

    let output = '';
    for (const segment of segments) {
      output += segment.quoted ? segment.text : this.rewrite(segment.text, output, scope);
    }
    return output;
  }

  /**
   * Compile a value assigned to a column. A bare `input.<key>` is cast to
   * the column's declared type.
   */
  compileValue(expression: string, scope: ExpressionScope, field?: FieldDefinition): string {
    const match = INPUT_ONLY.exec(expression.trim());
    if (match) {
      const cast = field ? castSuffix(toPgType(field, scope.location)) : '';
      return `${inputRef(match[1])}${cast}`;
    }
    return this.compile(expression, scope);
  }

  private rewrite(code: string, preceding: string, scope: ExpressionScope): string {
    let result = '';
    let last = 0;

    for (const match of code.matchAll(TOKEN)) {
      const index = match.index ?? 0;
      result += code.slice(last, index);
      result += this.rewriteToken(match[0], preceding + result, scope);
      last = index + match[0].length;
    }

    return result + code.slice(last);
  }

  private rewriteToken(token: string, preceding: string, scope: ExpressionScope): string {
    const dot = token.indexOf('.');
    if (dot === -1) {
      if (token.startsWith('p_') && !scope.parameters.has(token)) {
        throw new BindingError(
          ErrorCodes.UNKNOWN_PARAMETER,
          `Expression references undeclared parameter ${token}`,
          scope.location
        );
      }
      return token;
    }

    const qualifier = token.slice(0, dot);
    const member = token.slice(dot + 1);

    if (qualifier === 'input') {
      return inputRef(member) + this.contextCast(preceding, scope);
    }

    if (qualifier === 'caller') {
      if (member === 'id') return 'auth_user_id';
      if (member === 'tenant_id') return 'auth_tenant_id';
      throw new ExpressionError(
        ErrorCodes.MALFORMED_EXPRESSION,
        `Unknown caller attribute caller.${member}; use caller.id or caller.tenant_id`,
        scope.location,
        { token }
      );
    }

    if (/^[A-Z]/.test(qualifier)) {
      if (member !== 'id') {
        throw new ExpressionError(
          ErrorCodes.MALFORMED_EXPRESSION,
          `Entity references only support .id, got ${token}`,
          scope.location,
          { token }
        );
      }
      return scope.bindings.require(qualifier, scope.location).variable;
    }

    return token;
  }

  /**
   * Cast for an input value that follows `<column> <op>`.
   */
  private contextCast(preceding: string, scope: ExpressionScope): string {
    const match = COMPARISON_TAIL.exec(preceding);
    if (!match) {
      return '';
    }
    const column = match[1];
    if (column === 'id') {
      return '::UUID';
    }
    const field = scope.target?.fields[column];
    return field ? castSuffix(toPgType(field, scope.location)) : '';
  }

  private checkCharacters(source: string, scope: ExpressionScope): void {
    const found = SUSPICIOUS_CHARACTERS.find((c) => source.includes(c));
    if (found !== undefined) {
      throw new ExpressionError(
        ErrorCodes.UNSAFE_EXPRESSION,
        'Expression contains a suspicious character',
        scope.location,
        { expression: source }
      );
    }
    // $$ would close the function body
    if (source.includes('$$')) {
      throw new ExpressionError(
        ErrorCodes.UNSAFE_EXPRESSION,
        'Expression contains a dollar-quote delimiter',
        scope.location,
        { expression: source }
      );
    }
  }

  private checkPatterns(source: string, code: string, scope: ExpressionScope): void {
    for (const { pattern, reason } of DANGEROUS_PATTERNS) {
      if (pattern.test(code)) {
        throw new ExpressionError(
          ErrorCodes.UNSAFE_EXPRESSION,
          `Potentially dangerous SQL in expression (${reason}): ${source}`,
          scope.location,
          { expression: source, reason }
        );
      }
    }
  }

  private checkParentheses(source: string, code: string, scope: ExpressionScope): void {
    let depth = 0;
    for (const char of code) {
      if (char === '(') depth++;
      if (char === ')') depth--;
      if (depth < 0) break;
    }
    if (depth !== 0) {
      throw new ExpressionError(
        ErrorCodes.MALFORMED_EXPRESSION,
        `Unbalanced parentheses in expression: ${source}`,
        scope.location,
        { expression: source }
      );
    }
  }

  /**
   * Split into quoted (`'...'`, `"..."`) and unquoted runs.
   * A doubled quote inside a literal is an escaped quote.
   */
  private splitQuoted(source: string, scope: ExpressionScope): Segment[] {
    const segments: Segment[] = [];
    let current = '';
    let i = 0;

    while (i < source.length) {
      const char = source[i];
      if (char !== "'" && char !== '"') {
        current += char;
        i++;
        continue;
      }

      if (current) {
        segments.push({ quoted: false, text: current });
        current = '';
      }

      let end = i + 1;
      for (;;) {
        end = source.indexOf(char, end);
        if (end === -1) {
          throw new ExpressionError(
            ErrorCodes.MALFORMED_EXPRESSION,
            `Unterminated quoted text in expression: ${source}`,
            scope.location,
            { expression: source }
          );
        }
        if (source[end + 1] === char) {
          end += 2;
          continue;
        }
        break;
      }

      segments.push({ quoted: true, text: source.slice(i, end + 1) });
      i = end + 1;
    }

    if (current) {
      segments.push({ quoted: false, text: current });
    }
    return segments;
  }
}

function inputRef(key: string): string {
  return `(input_payload->>'${key}')`;
}
