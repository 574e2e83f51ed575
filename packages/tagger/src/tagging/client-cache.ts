/**
 * Lazily built SDK clients, one per region, kept for the life of the
 * process (warm Lambda invocations reuse them).
 */
export class RegionalClientCache<C> {
  private readonly clients = new Map<string, C>();

  constructor(private readonly factory: (region: string) => C) {}

  get(region: string): C {
    const cached = this.clients.get(region);
    if (cached !== undefined) {
      return cached;
    }

    const client = this.factory(region);
    this.clients.set(region, client);
    return client;
  }
}
