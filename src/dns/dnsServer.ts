import dgram from 'node:dgram';
import net from 'node:net';
import dnsPacket, { type Answer, type Packet } from 'dns-packet';

import type { AppConfig } from '../config.js';
import type { Logger } from '../logger.js';
import type { Classifier } from '../reputation/classifier.js';
import { respond, type ResponderOptions } from './responder.js';

export type DnsRuntimeStats = {
  startedAt: string | null;
  lastQueryAt: string | null;
  lastTransport: 'udp' | 'tcp' | null;
  totalQueries: number;
  answeredReplies: number;
  emptyReplies: number;
  droppedMessages: number;
};

export const dnsRuntimeStats: DnsRuntimeStats = {
  startedAt: null,
  lastQueryAt: null,
  lastTransport: null,
  totalQueries: 0,
  answeredReplies: 0,
  emptyReplies: 0,
  droppedMessages: 0
};

export type DnsServerHandle = {
  close: () => Promise<void>;
  udpAddresses: () => net.AddressInfo[];
  tcpAddresses: () => net.AddressInfo[];
};

const OPCODE_QUERY = 0;

function opcodeOf(flags: number): number {
  return (flags >> 11) & 0xf;
}

function resetStats(): void {
  dnsRuntimeStats.startedAt = new Date().toISOString();
  dnsRuntimeStats.lastQueryAt = null;
  dnsRuntimeStats.lastTransport = null;
  dnsRuntimeStats.totalQueries = 0;
  dnsRuntimeStats.answeredReplies = 0;
  dnsRuntimeStats.emptyReplies = 0;
  dnsRuntimeStats.droppedMessages = 0;
}

/**
 * Decodes one DNS message and builds the reply. Returns null for bytes that do not decode
 * (there is no id to answer to) and for messages that are themselves responses.
 */
export function handleQuery(msg: Buffer, classifier: Classifier, opts: ResponderOptions): Buffer | null {
  let query: Packet;
  try {
    query = dnsPacket.decode(msg);
  } catch {
    dnsRuntimeStats.droppedMessages += 1;
    return null;
  }

  // QR set: never answer a response.
  if (query.type === 'response') {
    dnsRuntimeStats.droppedMessages += 1;
    return null;
  }

  const flags = query.flags ?? 0;
  const questions = query.questions ?? [];
  const answers: Answer[] = [];

  // Only standard queries are classified; anything else gets a well-formed empty reply.
  if (opcodeOf(flags) === OPCODE_QUERY) {
    for (const question of questions) answers.push(...respond(classifier, question, opts));
  }

  if (answers.length) dnsRuntimeStats.answeredReplies += 1;
  else dnsRuntimeStats.emptyReplies += 1;

  return dnsPacket.encode({
    type: 'response',
    id: query.id,
    // Keep opcode and RD from the query, clear the RCODE bits (NOERROR), mark the answer authoritative.
    flags: (flags & ~0xf) | dnsPacket.AUTHORITATIVE_ANSWER,
    questions,
    answers
  });
}

function recordQuerySeen(transport: 'udp' | 'tcp'): void {
  dnsRuntimeStats.totalQueries += 1;
  dnsRuntimeStats.lastQueryAt = new Date().toISOString();
  dnsRuntimeStats.lastTransport = transport;
}

type BindPlan = { mode: 'v4' | 'v6'; hosts: string[] } | { mode: 'dual'; hosts: [string, string] };

function resolveDnsBindHosts(hostRaw: string): BindPlan {
  const host = String(hostRaw ?? '').trim();

  if (host && host.includes(':') && host !== '0.0.0.0') return { mode: 'v6', hosts: [host] };
  if (host && host !== '0.0.0.0') return { mode: 'v4', hosts: [host] };

  // Default: bind both stacks.
  return { mode: 'dual', hosts: ['0.0.0.0', '::'] };
}

export async function startDnsServer(
  config: Pick<AppConfig, 'DNS_HOST' | 'DNS_PORT'>,
  classifier: Classifier,
  responder: ResponderOptions,
  logger: Logger
): Promise<DnsServerHandle> {
  resetStats();

  const bindCfg = resolveDnsBindHosts(config.DNS_HOST);
  const udpSockets: dgram.Socket[] = [];
  const tcpServers: net.Server[] = [];
  const tcpConnections = new Set<net.Socket>();

  const createUdpSocket = (host: string): dgram.Socket => {
    const udp = host.includes(':') ? dgram.createSocket({ type: 'udp6', ipv6Only: true }) : dgram.createSocket('udp4');
    udp.on('error', (err) => logger.warn({ err, host }, 'dns udp socket error'));
    udp.on('message', (msg, rinfo) => {
      recordQuerySeen('udp');
      const resp = handleQuery(msg, classifier, responder);
      if (!resp) return;
      udp.send(resp, rinfo.port, rinfo.address, (err) => {
        if (err) logger.debug({ err, client: rinfo.address }, 'dns udp send failed');
      });
    });
    return udp;
  };

  const createTcpServer = (): net.Server =>
    net.createServer((socket) => {
      tcpConnections.add(socket);
      socket.on('close', () => tcpConnections.delete(socket));
      socket.setTimeout(10_000);
      let buf = Buffer.alloc(0);

      socket.on('data', (data) => {
        buf = Buffer.concat([buf, data]);
        while (buf.length >= 2) {
          const len = buf.readUInt16BE(0);
          if (buf.length < 2 + len) return;
          const msg = buf.subarray(2, 2 + len);
          buf = buf.subarray(2 + len);

          recordQuerySeen('tcp');
          const resp = handleQuery(msg, classifier, responder);
          if (!resp) continue;
          const outLen = Buffer.alloc(2);
          outLen.writeUInt16BE(resp.length, 0);
          socket.write(Buffer.concat([outLen, resp]));
        }
      });

      socket.on('timeout', () => socket.end());
      socket.on('error', (err) => logger.debug({ err }, 'dns tcp connection error'));
    });

  const bindUdp = (udp: dgram.Socket, host: string): Promise<void> =>
    new Promise<void>((resolve, reject) => {
      udp.once('error', reject);
      udp.bind(config.DNS_PORT, host, () => {
        udp.off('error', reject);
        resolve();
      });
    });

  const listenTcp = (tcp: net.Server, host: string): Promise<void> =>
    new Promise<void>((resolve, reject) => {
      tcp.once('error', reject);
      tcp.listen({ port: config.DNS_PORT, host, ipv6Only: host.includes(':') ? true : undefined }, () => {
        tcp.off('error', reject);
        resolve();
      });
    });

  async function close(): Promise<void> {
    for (const udp of udpSockets) {
      await new Promise<void>((resolve) => {
        try {
          udp.close(() => resolve());
        } catch {
          // already closed
          resolve();
        }
      });
    }

    for (const socket of tcpConnections) socket.destroy();
    for (const tcp of tcpServers) {
      await new Promise<void>((resolve) => {
        tcp.close(() => resolve());
      });
    }
  }

  try {
    for (const host of bindCfg.hosts) {
      const udp = createUdpSocket(host);
      udpSockets.push(udp);
      await bindUdp(udp, host);

      // Separate v4/v6 servers to avoid dual-stack quirks.
      const tcp = createTcpServer();
      tcpServers.push(tcp);
      await listenTcp(tcp, host);
    }
  } catch (e) {
    await close();
    throw e;
  }

  const addressesOf = (items: Array<dgram.Socket | net.Server>): net.AddressInfo[] => {
    const out: net.AddressInfo[] = [];
    for (const item of items) {
      const addr = item.address();
      if (addr && typeof addr === 'object') out.push(addr);
    }
    return out;
  };

  logger.info({ host: config.DNS_HOST, port: config.DNS_PORT, mode: bindCfg.mode }, 'dns listener started');

  return {
    close,
    udpAddresses: () => addressesOf(udpSockets),
    tcpAddresses: () => addressesOf(tcpServers)
  };
}
