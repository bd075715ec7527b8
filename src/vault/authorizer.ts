import type { Authorizer } from '../types';

/** Admin gate backed by a fixed set of wallets */
export class AllowlistAuthorizer implements Authorizer {
  private admins: Set<string>;

  constructor(admins: Iterable<string>) {
    this.admins = new Set(admins);
  }

  isAuthorized(caller: string): boolean {
    return this.admins.has(caller);
  }
}
