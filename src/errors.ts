export type NameKind = 'surface' | 'cell' | 'universe';

export class AlreadyNestedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AlreadyNestedError';
  }
}

export class NameNotFoundError extends Error {
  readonly kind: NameKind;
  readonly unitName: string;

  constructor(kind: NameKind, unitName: string) {
    super(`No ${kind} named '${unitName}' in the system definition`);
    this.name = 'NameNotFoundError';
    this.kind = kind;
    this.unitName = unitName;
  }
}

export class InvalidLatticeAttachmentError extends Error {
  constructor(kind: string) {
    super(`A lattice spec can only be attached to a nested cell, not to a ${kind}`);
    this.name = 'InvalidLatticeAttachmentError';
  }
}

/** Raised by the loader when a JSON document does not describe a unit or a system. */
export class UnitDefinitionError extends Error {
  readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super(`Invalid ${source}:\n${issues.map(i => `  ${i}`).join('\n')}`);
    this.name = 'UnitDefinitionError';
    this.issues = issues;
  }
}
