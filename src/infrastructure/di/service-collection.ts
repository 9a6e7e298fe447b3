/**
 * @fileoverview ServiceCollection - Service Registration
 *
 * @packageDocumentation
 * @module scopeline/infrastructure/di
 *
 * Build-phase half of the container. Registrations are collected here and
 * frozen into a {@link ServiceProvider} by `build()`; the provider never sees
 * later changes to the collection.
 */

import {
  type BuildOptions,
  type Constructor,
  type IServiceCollection,
  type ServiceDescriptor,
  type ServiceFactory,
  type ServiceIdentifier,
  ServiceLifetime,
  getInjectableLifetime,
  isConstructor,
} from '../../application/di/IDependencyInjection';
import { ArgumentNullError, ensureArgument } from '../../application/di/errors';
import { ServiceProvider } from './service-provider';

export class ServiceCollection implements IServiceCollection {
  /**
   * Registrations keyed by capability, in registration order.
   */
  private readonly descriptors = new Map<ServiceIdentifier, ServiceDescriptor>();

  // ==================== Class Registration ====================

  addSingleton<T>(implementationType: Constructor<T>): this;
  addSingleton<T>(serviceType: ServiceIdentifier<T>, implementationType: Constructor<T>): this;
  addSingleton<T>(serviceType: ServiceIdentifier<T>, implementationType?: Constructor<T>): this {
    return this.addClass(serviceType, implementationType, ServiceLifetime.Singleton);
  }

  addScoped<T>(implementationType: Constructor<T>): this;
  addScoped<T>(serviceType: ServiceIdentifier<T>, implementationType: Constructor<T>): this;
  addScoped<T>(serviceType: ServiceIdentifier<T>, implementationType?: Constructor<T>): this {
    return this.addClass(serviceType, implementationType, ServiceLifetime.Scoped);
  }

  addTransient<T>(implementationType: Constructor<T>): this;
  addTransient<T>(serviceType: ServiceIdentifier<T>, implementationType: Constructor<T>): this;
  addTransient<T>(serviceType: ServiceIdentifier<T>, implementationType?: Constructor<T>): this {
    return this.addClass(serviceType, implementationType, ServiceLifetime.Transient);
  }

  add<T>(implementationType: Constructor<T>): this {
    ensureArgument(implementationType, 'implementationType');
    const lifetime = getInjectableLifetime(implementationType) ?? ServiceLifetime.Transient;
    return this.addClass(implementationType, implementationType, lifetime);
  }

  // ==================== Factory Registration ====================

  addSingletonFactory<T>(serviceType: ServiceIdentifier<T>, factory: ServiceFactory<T>): this {
    return this.addFactory(serviceType, factory, ServiceLifetime.Singleton);
  }

  addScopedFactory<T>(serviceType: ServiceIdentifier<T>, factory: ServiceFactory<T>): this {
    return this.addFactory(serviceType, factory, ServiceLifetime.Scoped);
  }

  addTransientFactory<T>(serviceType: ServiceIdentifier<T>, factory: ServiceFactory<T>): this {
    return this.addFactory(serviceType, factory, ServiceLifetime.Transient);
  }

  // ==================== Instance Registration ====================

  /**
   * Register a pre-built instance.
   *
   * @remarks
   * The container does not own the instance and never disposes it.
   */
  addInstance<T>(serviceType: ServiceIdentifier<T>, instance: T): this {
    ensureArgument(serviceType, 'serviceType');
    ensureArgument(instance, 'instance');
    return this.register({ serviceType, lifetime: ServiceLifetime.Singleton, instance });
  }

  // ==================== Utility Methods ====================

  has(serviceType: ServiceIdentifier): boolean {
    return this.descriptors.has(serviceType);
  }

  getDescriptors(): readonly ServiceDescriptor[] {
    return [...this.descriptors.values()];
  }

  get count(): number {
    return this.descriptors.size;
  }

  build(options: BuildOptions = {}): ServiceProvider {
    return new ServiceProvider(this.getDescriptors(), options);
  }

  // ==================== Internals ====================

  private addClass<T>(
    serviceType: ServiceIdentifier<T>,
    implementationType: Constructor<T> | undefined,
    lifetime: ServiceLifetime,
  ): this {
    ensureArgument(serviceType, 'serviceType');
    if (implementationType) {
      return this.register({ serviceType, lifetime, implementationType });
    }
    if (!isConstructor(serviceType)) {
      throw new ArgumentNullError('implementationType');
    }
    return this.register({ serviceType, lifetime, implementationType: serviceType });
  }

  private addFactory<T>(
    serviceType: ServiceIdentifier<T>,
    factory: ServiceFactory<T>,
    lifetime: ServiceLifetime,
  ): this {
    ensureArgument(serviceType, 'serviceType');
    ensureArgument(factory, 'factory');
    return this.register({ serviceType, lifetime, factory });
  }

  private register<T>(descriptor: ServiceDescriptor<T>): this {
    // Re-registration replaces and moves the entry to the end
    this.descriptors.delete(descriptor.serviceType);
    this.descriptors.set(descriptor.serviceType, descriptor);
    return this;
  }
}

export function createServiceCollection(): ServiceCollection {
  return new ServiceCollection();
}
