import { DuplicateNameError, MissingNameError } from "./errors";

export type RegistrableType = abstract new (...args: never[]) => unknown;

export type ClassRegistrar<T extends RegistrableType> = <C extends T>(
  target: C,
  context: ClassDecoratorContext<C>
) => void;

/**
 * Maps a name declared as an own static property of a class to the class
 * itself. Names are checked once, when the class is registered; lookups
 * never validate or mutate.
 *
 * @example
 * const TOOLS = new NamedTypeRegistry<ToolClass>("tool", "toolName");
 * const registerTool = TOOLS.registrar();
 *
 * @registerTool
 * class Iperf extends Benchmark {
 *   static readonly toolName = "iperf";
 * }
 *
 * TOOLS.lookup("iperf"); // Iperf
 */
export class NamedTypeRegistry<T extends RegistrableType> {
  private readonly typesByName = new Map<string, T>();

  constructor(
    readonly kind: string,
    readonly nameKey: string
  ) {}

  register<C extends T>(type: C): C {
    const name = this.declaredName(type);
    if (!name) {
      throw new MissingNameError(this.kind, type.name || "<anonymous class>", this.nameKey);
    }

    const existing = this.typesByName.get(name);
    if (existing === type) return type;
    if (existing) {
      throw new DuplicateNameError(this.kind, type.name, name, existing.name);
    }

    this.typesByName.set(name, type);
    return type;
  }

  /**
   * Class decorator that registers the decorated class once its static
   * fields are in place. A failure propagates out of the class definition,
   * so the class binding is never created. Static initializers have already
   * run by then and may have handed `this` elsewhere; such a class is still
   * left out of the registry.
   */
  registrar(): ClassRegistrar<T> {
    const registry = this;
    return function <C extends T>(_target: C, context: ClassDecoratorContext<C>): void {
      context.addInitializer(function (this: C) {
        registry.register(this);
      });
    };
  }

  lookup(name: string): T | undefined {
    return this.typesByName.get(name);
  }

  has(name: string): boolean {
    return this.typesByName.has(name);
  }

  names(): string[] {
    return Array.from(this.typesByName.keys());
  }

  // Inherited statics do not count: the name identifies this class only.
  private declaredName(type: T): string | null {
    const value: unknown = Object.getOwnPropertyDescriptor(type, this.nameKey)?.value;
    if (typeof value !== "string" || value.trim().length === 0) return null;
    return value;
  }
}
