import { execFile } from 'child_process';
import { FullMembershipListing } from '../types';
import { Logger, createLogger } from '../common/logger';
import { MembershipQueryError, toError } from '../common/errors';
import { MembershipListener, MembershipSource } from './types';
import { SerfParseOptions, parseSerfHandlerInput, parseSerfMembers } from './SerfEventParser';

export type CommandRunner = (command: string, args: string[]) => Promise<string>;

export interface SerfMembershipSourceOptions extends SerfParseOptions {
  serfBinary?: string;
  rpcAddress?: string;
  queryTimeout?: number;
  runner?: CommandRunner;
}

/**
 * Runs a command and resolves with its stdout
 */
export function execFileRunner(timeoutMs: number): CommandRunner {
  return (command, args) =>
    new Promise<string>((resolve, reject) => {
      execFile(command, args, { timeout: timeoutMs, maxBuffer: 4 * 1024 * 1024 }, (error, stdout) => {
        if (error) {
          reject(error);
          return;
        }
        resolve(stdout);
      });
    });
}

/**
 * Membership source backed by a local Serf agent.
 *
 * Full listings come from `serf members -format json`. Events are pushed in
 * through `ingestHandlerInvocation`, which takes what Serf gives an event
 * handler: the SERF_EVENT name and the member lines on stdin.
 */
export class SerfMembershipSource implements MembershipSource {
  private listeners = new Set<MembershipListener>();
  private readonly runner: CommandRunner;

  constructor(
    private readonly options: SerfMembershipSourceOptions,
    private readonly logger: Logger = createLogger()
  ) {
    this.runner = options.runner ?? execFileRunner(options.queryTimeout ?? 10000);
  }

  subscribe(listener: MembershipListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Forward one handler invocation; returns how many events were delivered
   */
  ingestHandlerInvocation(eventName: string, stdin: string): number {
    const events = parseSerfHandlerInput(eventName, stdin, this.options);
    if (events.length === 0) {
      this.logger.membership(`No ${this.options.role} members involved in ${eventName}, ignoring`);
    }
    for (const event of events) {
      for (const listener of Array.from(this.listeners)) {
        listener(event);
      }
    }
    return events.length;
  }

  async fetchFullMembership(): Promise<FullMembershipListing> {
    const args = ['members', '-format', 'json', `-tag`, `role=${this.options.role}`];
    if (this.options.rpcAddress) {
      args.push(`-rpc-addr=${this.options.rpcAddress}`);
    }

    let output: string;
    try {
      output = await this.runner(this.options.serfBinary ?? 'serf', args);
    } catch (error) {
      throw new MembershipQueryError(`serf members failed: ${toError(error).message}`, toError(error));
    }

    try {
      return parseSerfMembers(output, this.options);
    } catch (error) {
      throw new MembershipQueryError(`Unreadable serf members output: ${toError(error).message}`, toError(error));
    }
  }
}
