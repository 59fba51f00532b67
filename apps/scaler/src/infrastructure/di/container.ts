/**
 * Dependency Injection Container
 *
 * IoC container keyed by the names of a service map, so `resolve` is typed
 * by the token it is given.
 */

type Factory<T> = () => T;

interface Registration<T> {
  singleton: boolean;
  factory: Factory<T>;
  cached: { value: T } | null;
}

type Registrations<M> = { [K in keyof M]?: Registration<M[K]> };

export class Container<M> {
  private registrations: Registrations<M> = {};

  /**
   * Register a new dependency.
   * @param token - The token to register the dependency under.
   * @param factory - The factory function to create the dependency.
   * @param options - singleton: true by default.
   */
  register<K extends keyof M>(token: K, factory: Factory<M[K]>, options: { singleton?: boolean } = {}): this {
    this.registrations[token] = {
      singleton: options.singleton ?? true,
      factory,
      cached: null,
    };
    return this;
  }

  /** Register an already-built instance. */
  registerInstance<K extends keyof M>(token: K, instance: M[K]): this {
    this.registrations[token] = {
      singleton: true,
      factory: () => instance,
      cached: { value: instance },
    };
    return this;
  }

  resolve<K extends keyof M>(token: K): M[K] {
    const registration = this.registrations[token];
    if (!registration) {
      throw new Error(`No registration found for token: ${String(token)}`);
    }

    if (registration.cached) {
      return registration.cached.value;
    }

    const instance = registration.factory();
    if (registration.singleton) {
      registration.cached = { value: instance };
    }
    return instance;
  }

  has(token: keyof M): boolean {
    return this.registrations[token] !== undefined;
  }

  clear(): void {
    this.registrations = {};
  }
}
