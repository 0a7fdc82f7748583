import type { Variable } from './Expression';
import { UnboundVariableError } from './Errors';
import type { NodeId, VariableNode } from './Node';

/**
 * Values for the variables of an expression. Keys are Variable instances or
 * variable names; a plain object binds by name only.
 * @public
 */
export type Environment =
  | ReadonlyMap<Variable | string, number>
  | Readonly<Record<string, number>>;

function isBindingMap(env: Environment): env is ReadonlyMap<Variable | string, number> {
  return env instanceof Map;
}

/**
 * Lookup table built once per evaluate/differentiate call.
 * Instance bindings win over name bindings.
 * @internal
 */
export class Bindings {
  private readonly byId = new Map<NodeId, number>();
  private readonly byName = new Map<string, number>();

  static from(env: Environment): Bindings {
    const bindings = new Bindings();
    if (isBindingMap(env)) {
      for (const [key, value] of env) {
        if (typeof key === 'string') {
          bindings.byName.set(key, value);
        } else {
          bindings.byId.set(key.node.id, value);
        }
      }
    } else {
      for (const [name, value] of Object.entries(env)) {
        bindings.byName.set(name, value);
      }
    }
    return bindings;
  }

  resolve(node: VariableNode): number {
    const byInstance = this.byId.get(node.id);
    if (byInstance !== undefined) return byInstance;
    const byName = this.byName.get(node.name);
    if (byName !== undefined) return byName;
    throw new UnboundVariableError(node.name);
  }
}
