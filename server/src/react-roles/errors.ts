/**
 * Validation errors raised by admin operations on the reaction-roles engine.
 * They are reported to the caller as-is and never retried.
 */
export class ReactRolesError extends Error {
  constructor(
    readonly code: string,
    message: string,
  ) {
    super(message);
    this.name = 'ReactRolesError';
  }
}

export class AlreadyBoundError extends ReactRolesError {
  constructor(symbol: string) {
    super('ALREADY_BOUND', `The emoji ${symbol} is already bound on that message`);
    this.name = 'AlreadyBoundError';
  }
}

export class NotBoundError extends ReactRolesError {
  constructor(what: string) {
    super('NOT_BOUND', `${what} is not bound on that message`);
    this.name = 'NotBoundError';
  }
}

export class PairInvalidError extends ReactRolesError {
  constructor(detail: string) {
    super('PAIR_INVALID', `Cannot link messages: ${detail}`);
    this.name = 'PairInvalidError';
  }
}

export class LinkNotFoundError extends ReactRolesError {
  constructor(name: string) {
    super('LINK_NOT_FOUND', `No link named "${name}" exists in this server`);
    this.name = 'LinkNotFoundError';
  }
}

export class CannotReconcileLinkedError extends ReactRolesError {
  constructor() {
    super('CANNOT_RECONCILE_LINKED', 'Linked messages cannot be checked: it is ambiguous which role to give');
    this.name = 'CannotReconcileLinkedError';
  }
}

export class MessageNotFoundError extends ReactRolesError {
  constructor() {
    super('MESSAGE_NOT_FOUND', 'Message not found');
    this.name = 'MessageNotFoundError';
  }
}

export class RoleNotFoundError extends ReactRolesError {
  constructor(roleId: string) {
    super('ROLE_NOT_FOUND', `Role ${roleId} does not exist in this server`);
    this.name = 'RoleNotFoundError';
  }
}

export class InvalidSymbolError extends ReactRolesError {
  constructor(symbol: string) {
    super('INVALID_SYMBOL', `Emoji ${symbol} not found in any of my servers or in unicode emojis`);
    this.name = 'InvalidSymbolError';
  }
}
