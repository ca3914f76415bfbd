/**
 * Dependency Injection Container
 *
 * Tokens are the keys of a registry interface, so `resolve` returns the
 * registered type without casts.
 */

type Factory<T> = () => T;

interface Registration<T> {
  singleton: boolean;
  factory: Factory<T>;
}

type Registrations<Registry> = { [Token in keyof Registry]?: Registration<Registry[Token]> };
type Instances<Registry> = { [Token in keyof Registry]?: { value: Registry[Token] } };

export class Container<Registry extends object> {
  private registrations: Registrations<Registry> = {};
  private instances: Instances<Registry> = {};

  /**
   * Register a factory. Singleton by default: the first `resolve` caches the
   * instance.
   */
  register<Token extends keyof Registry>(
    token: Token,
    factory: Factory<Registry[Token]>,
    options: { singleton?: boolean } = {},
  ): this {
    this.registrations[token] = { singleton: options.singleton ?? true, factory };
    delete this.instances[token];
    return this;
  }

  registerInstance<Token extends keyof Registry>(token: Token, instance: Registry[Token]): this {
    this.registrations[token] = { singleton: true, factory: () => instance };
    this.instances[token] = { value: instance };
    return this;
  }

  resolve<Token extends keyof Registry>(token: Token): Registry[Token] {
    const cached = this.instances[token];
    if (cached) {
      return cached.value;
    }

    const registration = this.registrations[token];
    if (!registration) {
      throw new Error(`No registration found for token: ${String(token)}`);
    }

    const instance = registration.factory();
    if (registration.singleton) {
      this.instances[token] = { value: instance };
    }
    return instance;
  }

  has(token: keyof Registry): boolean {
    return this.registrations[token] !== undefined;
  }

  clear(): void {
    this.registrations = {};
    this.instances = {};
  }
}
