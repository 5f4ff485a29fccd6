import { describe, expect, it } from "vitest";
import { ServiceRegistrationError, ServiceResolutionError } from "@kernelkit/core";
import { FakeExecutionEngine, FakeLogger, createTestContext } from "@kernelkit/testing";

import { type ServiceBinding, ServiceRegistry } from "../src/index";

const context = createTestContext();

describe("ServiceRegistry", () => {
  it("lets a later registration of a core capability replace the earlier one", () => {
    const registry = new ServiceRegistry();
    const first = new FakeExecutionEngine();
    const second = new FakeExecutionEngine();

    registry.addInstance("engine", first).addInstance("engine", second);
    const provider = registry.createProvider(context, "info");

    expect(provider.resolve("engine")).toBe(second);
    expect(registry.capabilities()).toEqual(["engine"]);
    expect(registry.replacedCapabilities()).toEqual(["engine"]);
  });

  it("constructs each service once and shares it between consumers", () => {
    const registry = new ServiceRegistry();
    let built = 0;
    const counter = registry.addService("counter", () => ({ id: ++built }));
    registry.addSingleton("engine", ({ get }) => {
      get(counter);
      return new FakeExecutionEngine();
    });

    const provider = registry.createProvider(context, "info");
    provider.resolve("engine");

    expect(provider.get(counter)).toEqual({ id: 1 });
    expect(provider.get(counter)).toBe(provider.get(counter));
    expect(built).toBe(1);
    expect(provider.isResolved("counter")).toBe(true);
  });

  it("hands factories the frozen context and the log level", () => {
    const registry = new ServiceRegistry();
    const seen = registry.addService("seen", ({ context: scoped, logLevel }) => ({
      kernelName: scoped.identity.kernelName,
      logLevel,
    }));

    const provider = registry.createProvider(context, "debug");

    expect(provider.get(seen)).toEqual({ kernelName: "demo", logLevel: "debug" });
    expect(provider.context).toBe(context);
  });

  it("rejects duplicate collaborator services and core names", () => {
    const registry = new ServiceRegistry();
    registry.addService("transcript", () => []);

    expect(() => registry.addService("transcript", () => [])).toThrow(
      'A service named "transcript" is already registered',
    );
    expect(() => registry.addService("logger", () => new FakeLogger())).toThrow(ServiceRegistrationError);
  });

  it("refuses registrations once sealed", () => {
    const registry = new ServiceRegistry();
    registry.createProvider(context, "info");

    expect(registry.isSealed).toBe(true);
    expect(() => registry.addInstance("engine", new FakeExecutionEngine())).toThrow(
      'Cannot register "engine": services are already assembled',
    );
  });

  it("reports capabilities that were never registered", () => {
    const provider = new ServiceRegistry().createProvider(context, "info");

    expect(() => provider.resolve("engine")).toThrow(ServiceResolutionError);
    expect(() => provider.resolve("engine")).toThrow('No service registered for "engine"');
  });

  it("wraps construction failures with the capability name", () => {
    const registry = new ServiceRegistry();
    const cause = new Error("port is not a number");
    registry.addSingleton("engine", () => {
      throw cause;
    });
    const provider = registry.createProvider(context, "info");

    try {
      provider.resolve("engine");
      expect.fail("expected resolve to throw");
    } catch (error) {
      expect(error).toBeInstanceOf(ServiceResolutionError);
      expect(error).toMatchObject({
        capability: "engine",
        message: 'Failed to construct "engine": port is not a number',
        cause,
      });
    }
  });

  it("detects circular dependencies", () => {
    const registry = new ServiceRegistry();
    type Node = { next: unknown };
    const holder: { b?: ServiceBinding<Node> } = {};
    const a = registry.addService<Node>("a", ({ get }) => ({ next: holder.b ? get(holder.b) : null }));
    holder.b = registry.addService<Node>("b", ({ get }) => ({ next: get(a) }));
    const provider = registry.createProvider(context, "info");

    expect(() => provider.get(a)).toThrow("Circular service dependency: a -> b -> a");
    expect(provider.isResolved("a")).toBe(false);
  });

  it("only resolves bindings registered with it", () => {
    const other = new ServiceRegistry().addService("clock", () => 0);
    const provider = new ServiceRegistry().createProvider(context, "info");

    expect(() => provider.get(other)).toThrow('Service "clock" is not registered with this provider');
  });
});
