import {
  type CoreCapabilities,
  type LogLevel,
  type RuntimeContext,
  ServiceRegistrationError,
  ServiceResolutionError
} from '@kernelkit/core';

export type CoreCapability = keyof CoreCapabilities;

export interface ServiceScope {
  readonly context: RuntimeContext;
  readonly logLevel: LogLevel;
  /** Resolves one of the core capabilities by name. */
  resolve<K extends CoreCapability>(capability: K): CoreCapabilities[K];
  /** Resolves a collaborator service registered with `addService`. */
  get<T>(binding: ServiceBinding<T>): T;
}

export type ServiceFactory<T> = (scope: ServiceScope) => T;

/**
 * A registered singleton. Holds its factory and the instance built for each
 * provider, so the same binding yields the same instance to every consumer.
 */
export class ServiceBinding<T> {
  public readonly name: string;
  private readonly factory: ServiceFactory<T>;
  private readonly instances = new WeakMap<ServiceProvider, { value: T }>();

  public constructor(name: string, factory: ServiceFactory<T>) {
    this.name = name;
    this.factory = factory;
  }

  public isResolvedIn(provider: ServiceProvider): boolean {
    return this.instances.has(provider);
  }

  public resolveIn(provider: ServiceProvider, scope: ServiceScope): T {
    const cached = this.instances.get(provider);
    if (cached) {
      return cached.value;
    }
    const value = this.factory(scope);
    this.instances.set(provider, { value });
    return value;
  }
}

type CoreBindings = {
  [K in CoreCapability]?: ServiceBinding<CoreCapabilities[K]>;
};

/**
 * Append-only registration table. Core capabilities may be registered more
 * than once; the last registration wins. Collaborator services are
 * registered once each. Nothing can be registered after the table is sealed.
 */
export class ServiceRegistry {
  private readonly core: CoreBindings = {};
  private readonly services = new Map<string, ServiceBinding<unknown>>();
  private readonly order: string[] = [];
  private readonly replaced: CoreCapability[] = [];
  private sealed = false;

  public addSingleton<K extends CoreCapability>(capability: K, factory: ServiceFactory<CoreCapabilities[K]>): this {
    this.assertOpen(capability);

    if (this.core[capability] !== undefined) {
      this.replaced.push(capability);
    } else {
      this.order.push(capability);
    }
    const core: { [P in K]?: ServiceBinding<CoreCapabilities[P]> } = this.core;
    core[capability] = new ServiceBinding(capability, factory);
    return this;
  }

  /** Registers an already-constructed core capability. */
  public addInstance<K extends CoreCapability>(capability: K, instance: CoreCapabilities[K]): this {
    return this.addSingleton(capability, () => instance);
  }

  /**
   * Registers a service the embedding kernel's own services depend on.
   * Keep the returned binding to resolve it from other factories.
   */
  public addService<T>(name: string, factory: ServiceFactory<T>): ServiceBinding<T> {
    this.assertOpen(name);
    if (this.services.has(name) || isCoreCapability(name)) {
      throw new ServiceRegistrationError(`A service named "${name}" is already registered`);
    }

    const binding = new ServiceBinding(name, factory);
    this.services.set(name, binding);
    this.order.push(name);
    return binding;
  }

  public has(name: string): boolean {
    return isCoreCapability(name) ? this.core[name] !== undefined : this.services.has(name);
  }

  /** Registered names, in first-registration order. */
  public capabilities(): readonly string[] {
    return [...this.order];
  }

  /** Core capabilities that were registered again after their first registration. */
  public replacedCapabilities(): readonly CoreCapability[] {
    return [...this.replaced];
  }

  public seal(): void {
    this.sealed = true;
  }

  public get isSealed(): boolean {
    return this.sealed;
  }

  public createProvider(context: RuntimeContext, logLevel: LogLevel): ServiceProvider {
    this.seal();
    return new ServiceProvider({ ...this.core }, new Map(this.services), context, logLevel);
  }

  private assertOpen(name: string): void {
    if (this.sealed) {
      throw new ServiceRegistrationError(`Cannot register "${name}": services are already assembled`);
    }
  }
}

/**
 * Resolves registered services, constructing each at most once.
 */
export class ServiceProvider {
  private readonly core: CoreBindings;
  private readonly services: ReadonlyMap<string, ServiceBinding<unknown>>;
  private readonly resolving = new Set<string>();
  private readonly scope: ServiceScope;

  public constructor(
    core: CoreBindings,
    services: ReadonlyMap<string, ServiceBinding<unknown>>,
    context: RuntimeContext,
    logLevel: LogLevel
  ) {
    this.core = core;
    this.services = services;
    this.scope = {
      context,
      logLevel,
      resolve: <K extends CoreCapability>(capability: K): CoreCapabilities[K] => this.resolve(capability),
      get: <T>(binding: ServiceBinding<T>): T => this.get(binding)
    };
  }

  public get context(): RuntimeContext {
    return this.scope.context;
  }

  public resolve<K extends CoreCapability>(capability: K): CoreCapabilities[K] {
    const binding = this.core[capability];
    if (binding === undefined) {
      throw new ServiceResolutionError(capability, `No service registered for "${capability}"`);
    }
    return this.construct(binding);
  }

  public get<T>(binding: ServiceBinding<T>): T {
    if (this.services.get(binding.name) !== binding) {
      throw new ServiceResolutionError(binding.name, `Service "${binding.name}" is not registered with this provider`);
    }
    return this.construct(binding);
  }

  public isResolved(name: string): boolean {
    const binding = isCoreCapability(name) ? this.core[name] : this.services.get(name);
    return binding?.isResolvedIn(this) ?? false;
  }

  /** Constructs every collaborator service that has not been resolved yet. */
  public resolveServices(): void {
    for (const binding of this.services.values()) {
      this.construct(binding);
    }
  }

  private construct<T>(binding: ServiceBinding<T>): T {
    if (binding.isResolvedIn(this)) {
      return binding.resolveIn(this, this.scope);
    }

    if (this.resolving.has(binding.name)) {
      const chain = [...this.resolving, binding.name].join(' -> ');
      throw new ServiceResolutionError(binding.name, `Circular service dependency: ${chain}`);
    }

    this.resolving.add(binding.name);
    try {
      return binding.resolveIn(this, this.scope);
    } catch (error) {
      if (error instanceof ServiceResolutionError) {
        throw error;
      }
      throw new ServiceResolutionError(
        binding.name,
        `Failed to construct "${binding.name}": ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    } finally {
      this.resolving.delete(binding.name);
    }
  }
}

const CORE_CAPABILITIES: readonly CoreCapability[] = ['logger', 'engine', 'heartbeat', 'shell'];

function isCoreCapability(name: string): name is CoreCapability {
  return CORE_CAPABILITIES.some((capability) => capability === name);
}
