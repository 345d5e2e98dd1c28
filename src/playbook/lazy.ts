import { lookup } from '../state/lookup.js';
import type { TaskContext } from '../types/index.js';

/**
 * Deferred string expressions. They are plain data until `resolve` runs
 * them against the context of the task that owns them.
 */
export type LazyString =
  | { kind: 'literal'; value: string }
  | { kind: 'var'; name: string }
  | { kind: 'state'; task: string; path: string }
  | { kind: 'default'; primary: LazyString; fallback: LazyString }
  | { kind: 'format'; template: string; parts: LazyString[] };

export function literal(value: string): LazyString {
  return { kind: 'literal', value };
}

export function variable(name: string): LazyString {
  return { kind: 'var', name };
}

export function state(task: string, path: string): LazyString {
  return { kind: 'state', task, path };
}

export function withDefault(primary: LazyString, fallback: LazyString): LazyString {
  return { kind: 'default', primary, fallback };
}

export function interpolate(template: string, ...parts: LazyString[]): LazyString {
  return { kind: 'format', template, parts };
}

/** Evaluate an expression. Anything missing or non-string resolves to ''. */
export function resolve(expr: LazyString, context: TaskContext): string {
  switch (expr.kind) {
    case 'literal':
      return expr.value;
    case 'var':
      return Object.prototype.hasOwnProperty.call(context.vars, expr.name) ? context.vars[expr.name] : '';
    case 'state':
      return resolveState(expr.task, expr.path, context);
    case 'default': {
      const value = resolve(expr.primary, context);
      return value !== '' ? value : resolve(expr.fallback, context);
    }
    case 'format':
      return format(
        expr.template,
        expr.parts.map((part) => resolve(part, context)),
      );
  }
}

export function resolveAll(exprs: readonly LazyString[], context: TaskContext): string[] {
  return exprs.map((expr) => resolve(expr, context));
}

function resolveState(task: string, path: string, context: TaskContext): string {
  const stored = context.state.get(task);
  if (stored === undefined) return '';

  const found = lookup(path, stored);
  if (!found.ok || typeof found.value !== 'string') return '';
  return found.value;
}

/** `{}` takes the next value, `{{` and `}}` are literal braces. */
export function format(template: string, values: readonly string[]): string {
  let out = '';
  let next = 0;

  for (let i = 0; i < template.length; i++) {
    const ch = template[i];
    const following = template[i + 1];

    if (ch === '{' && following === '{') {
      out += '{';
      i++;
    } else if (ch === '}' && following === '}') {
      out += '}';
      i++;
    } else if (ch === '{' && following === '}') {
      out += values[next] ?? '';
      next++;
      i++;
    } else {
      out += ch;
    }
  }

  return out;
}

/** Render an unevaluated expression, e.g. `format("hello-{}", var(name))`. */
export function describeLazy(expr: LazyString): string {
  switch (expr.kind) {
    case 'literal':
      return JSON.stringify(expr.value);
    case 'var':
      return `var(${expr.name})`;
    case 'state':
      return `state(${JSON.stringify(expr.task)}, ${expr.path})`;
    case 'default':
      return `default(${describeLazy(expr.primary)}, ${describeLazy(expr.fallback)})`;
    case 'format':
      return `format(${[JSON.stringify(expr.template), ...expr.parts.map(describeLazy)].join(', ')})`;
  }
}
