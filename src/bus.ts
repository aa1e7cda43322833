import type { Connection, ConnectorId, Endpoint } from "./util.js";

function endpointKey(e: Endpoint): string {
  return `${e.id}:${e.connector}`;
}

/**
 * A shared circuit channel. Everything attached to a bus sees the same
 * combined signal; the links are kept in attachment order only so the
 * serialized wire list is stable.
 */
export class Bus {
  readonly label: string;
  private readonly links: Connection[] = [];

  constructor(label: string) {
    this.label = label;
  }

  link(a: Endpoint, b: Endpoint): Connection {
    if (a.id === b.id && a.connector === b.connector) {
      throw new Error(`${this.label}: cannot link ${endpointKey(a)} to itself`);
    }
    const wire = { from: a, to: b };
    this.links.push(wire);
    return wire;
  }

  /** Links consecutive endpoints, so n endpoints produce n - 1 wires. */
  chain(endpoints: Endpoint[]): Connection[] {
    const out: Connection[] = [];
    for (let i = 0; i + 1 < endpoints.length; i += 1) out.push(this.link(endpoints[i], endpoints[i + 1]));
    return out;
  }

  connections(): Connection[] {
    return [...this.links];
  }
}

export function endpoint(id: number, connector: ConnectorId): Endpoint {
  return { id, connector };
}
