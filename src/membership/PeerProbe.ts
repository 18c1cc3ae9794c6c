import * as net from 'net';
import { InstanceRecord } from '../types';
import { Logger, createLogger } from '../common/logger';
import { delay, isValidAddress } from '../common/utils';

/**
 * Second opinion on a failure report before the engine acts on it
 */
export interface PeerProbe {
  isReachable(instance: Readonly<InstanceRecord>): Promise<boolean>;
}

export interface TcpPeerProbeOptions {
  /** Port the gossip agent listens on */
  port: number;
  attempts: number;
  /** Connect timeout per attempt (ms) */
  timeout: number;
  /** Pause between attempts (ms) */
  retryDelay: number;
}

export const DEFAULT_PROBE_OPTIONS: TcpPeerProbeOptions = {
  port: 7946,
  attempts: 3,
  timeout: 1000,
  retryDelay: 1000
};

/**
 * Considers a peer reachable when a TCP connection to its gossip port opens.
 * Instances with no known address count as unreachable.
 */
export class TcpPeerProbe implements PeerProbe {
  private readonly options: TcpPeerProbeOptions;

  constructor(options: Partial<TcpPeerProbeOptions> = {}, private readonly logger: Logger = createLogger()) {
    this.options = { ...DEFAULT_PROBE_OPTIONS, ...options };
  }

  async isReachable(instance: Readonly<InstanceRecord>): Promise<boolean> {
    const address = instance.address;
    if (!address || !isValidAddress(address)) {
      this.logger.membership(`No usable address for ${instance.id}, treating it as down`);
      return false;
    }

    for (let attempt = 1; attempt <= this.options.attempts; attempt++) {
      if (await this.connect(address)) {
        return true;
      }
      this.logger.membership(`Probe ${attempt}/${this.options.attempts} of ${instance.id} at ${address}:${this.options.port} failed`);
      if (attempt < this.options.attempts) {
        await delay(this.options.retryDelay);
      }
    }
    return false;
  }

  private connect(address: string): Promise<boolean> {
    return new Promise(resolve => {
      const socket = net.createConnection({ host: address, port: this.options.port });
      let settled = false;

      const finish = (reachable: boolean): void => {
        if (settled) return;
        settled = true;
        socket.destroy();
        resolve(reachable);
      };

      socket.setTimeout(this.options.timeout);
      socket.once('connect', () => finish(true));
      socket.once('timeout', () => finish(false));
      socket.once('error', () => finish(false));
    });
  }
}
