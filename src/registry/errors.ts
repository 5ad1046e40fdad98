export class RegistryError extends Error {
  constructor(
    readonly kind: string,
    readonly typeName: string,
    message: string
  ) {
    super(message);
    this.name = "RegistryError";
  }
}

export class MissingNameError extends RegistryError {
  constructor(kind: string, typeName: string, readonly nameKey: string) {
    super(
      kind,
      typeName,
      `${typeName} is declared as a ${kind} but has no static "${nameKey}". Set it to a non-empty string on the class itself.`
    );
    this.name = "MissingNameError";
  }
}

export class DuplicateNameError extends RegistryError {
  constructor(
    kind: string,
    typeName: string,
    readonly registeredName: string,
    readonly existingTypeName: string
  ) {
    super(
      kind,
      typeName,
      `Cannot register ${typeName} as ${kind} "${registeredName}": already taken by ${existingTypeName}.`
    );
    this.name = "DuplicateNameError";
  }
}
