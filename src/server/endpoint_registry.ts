/**
 * Endpoint Registry — named analytics functions the dashboard can invoke.
 */

export type EndpointFunction = (...args: unknown[]) => Promise<string> | string;

export interface EndpointInfo {
  description: string;
  deployedAt: string;
}

interface Endpoint extends EndpointInfo {
  fn: EndpointFunction;
}

export class EndpointExistsError extends Error {
  constructor(readonly endpointName: string) {
    super(`Endpoint '${endpointName}' already exists; deploy with override to replace it`);
    this.name = "EndpointExistsError";
  }
}

export class EndpointRegistry {
  private readonly endpoints = new Map<string, Endpoint>();

  deploy(
    name: string,
    fn: EndpointFunction,
    options: { description?: string; override?: boolean } = {},
  ): void {
    if (this.endpoints.has(name) && !options.override) {
      throw new EndpointExistsError(name);
    }
    this.endpoints.set(name, {
      fn,
      description: options.description ?? "",
      deployedAt: new Date().toISOString(),
    });
  }

  has(name: string): boolean {
    return this.endpoints.has(name);
  }

  list(): Record<string, EndpointInfo> {
    const out: Record<string, EndpointInfo> = {};
    for (const [name, { description, deployedAt }] of this.endpoints) {
      out[name] = { description, deployedAt };
    }
    return out;
  }

  /** Invoke an endpoint; undefined when no endpoint has that name. */
  async query(name: string, args: unknown[]): Promise<string | undefined> {
    const endpoint = this.endpoints.get(name);
    if (!endpoint) return undefined;
    return endpoint.fn(...args);
  }
}
