import type { DelegationMethod, DelegationTarget, HandlerRegistry, ToolContext } from '../runtime/index.js';

/**
 * What a mocked delegation method does when called
 */
export type MethodBehavior =
  | { readonly kind: 'return'; readonly value: unknown }
  | { readonly kind: 'throw'; readonly message: string };

export interface RegistryConfig {
  /** When false the context carries no handlers and no backend */
  readonly available: boolean;
  /** Behavior of every method without an override */
  readonly defaultBehavior: MethodBehavior;
  /** Overrides keyed by 'target.method' or by bare method name */
  readonly methods?: Readonly<Record<string, MethodBehavior>>;
}

export interface Invocation {
  readonly target: string;
  readonly method: string;
  readonly args: readonly unknown[];
}

/**
 * Target name recorded for calls on the direct backend
 */
export const BACKEND_TARGET = 'backend';

/**
 * Simulated delegation layer.
 *
 * Any handler name resolves to a stand-in target and any method on it to a
 * recording stub, so tools can be exercised without knowing their targets
 * up front. Create one per test case.
 */
export class MockRegistry {
  private readonly overrides = new Map<string, MethodBehavior>();
  private readonly targets = new Map<string, DelegationTarget>();
  private readonly calls: Invocation[] = [];
  private readonly config: RegistryConfig;

  constructor(config: RegistryConfig) {
    this.config = config;
    for (const [key, behavior] of Object.entries(config.methods ?? {})) {
      this.overrides.set(key, behavior);
    }
  }

  /**
   * Override one method, by 'target.method' or bare method name
   */
  configure(key: string, behavior: MethodBehavior): this {
    this.overrides.set(key, behavior);
    return this;
  }

  /**
   * Calls recorded so far, in order
   */
  get invocations(): readonly Invocation[] {
    return [...this.calls];
  }

  /**
   * Stand-in for a named handler
   */
  target(name: string): DelegationTarget {
    const existing = this.targets.get(name);
    if (existing) {
      return existing;
    }

    const target = new Proxy<DelegationTarget>(
      {},
      {
        get: (_object, property) =>
          typeof property === 'string' && property !== 'then' ? this.method(name, property) : undefined,
      }
    );
    this.targets.set(name, target);
    return target;
  }

  /**
   * Context handed to the tool under test
   */
  context(): ToolContext {
    if (!this.config.available) {
      return {};
    }

    const handlers = new Proxy<HandlerRegistry>(
      {},
      {
        get: (_object, property) =>
          typeof property === 'string' && property !== 'then' ? this.target(property) : undefined,
      }
    );

    return { handlers, backend: this.target(BACKEND_TARGET) };
  }

  private behaviorFor(target: string, method: string): MethodBehavior {
    return this.overrides.get(`${target}.${method}`) ?? this.overrides.get(method) ?? this.config.defaultBehavior;
  }

  private method(target: string, method: string): DelegationMethod {
    return async (...args: unknown[]) => {
      this.calls.push({ target, method, args });
      const behavior = this.behaviorFor(target, method);
      if (behavior.kind === 'throw') {
        throw new Error(behavior.message);
      }
      return behavior.value;
    };
  }
}

/**
 * Fresh registry for one case
 */
export function createMockRegistry(config: RegistryConfig): MockRegistry {
  return new MockRegistry(config);
}
