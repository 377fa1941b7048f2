import { Socket, connect } from 'net';

export interface FtpReply {
  code: number;
  message: string;
}

export interface FtpControlChannelOptions {
  host: string;
  port: number;
  /** Bound on the handshake and on each command reply */
  timeoutMs: number;
  /** Receives every command sent and reply received, passwords masked */
  trace?: (line: string) => void;
}

export class FtpReplyError extends Error {
  constructor(
    public readonly command: string,
    public readonly reply: FtpReply,
  ) {
    super(`${command} rejected: ${reply.code} ${reply.message}`);
    this.name = 'FtpReplyError';
  }
}

export class FtpConnectionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'FtpConnectionError';
  }
}

type Outcome = { reply: FtpReply } | { error: Error };

/**
 * A reply that may arrive before or after anyone awaits it. Promises are
 * only created on `wait`, so a failed slot nobody awaits rejects nothing.
 */
class ReplySlot {
  private outcome?: Outcome;
  private readonly listeners: Array<(outcome: Outcome) => void> = [];

  settle(outcome: Outcome): void {
    if (this.outcome) return;
    this.outcome = outcome;
    for (const listener of this.listeners.splice(0)) listener(outcome);
  }

  observe(listener: (outcome: Outcome) => void): void {
    if (this.outcome) listener(this.outcome);
    else this.listeners.push(listener);
  }

  wait(): Promise<FtpReply> {
    return new Promise((resolve, reject) => {
      this.observe((outcome) => ('reply' in outcome ? resolve(outcome.reply) : reject(outcome.error)));
    });
  }
}

type WaiterKind = 'command' | 'noop' | 'transfer';

interface ReplyWaiter {
  kind: WaiterKind;
  command: string;
  /** Transfers get a preliminary (1xx) and a completion reply */
  stage: 'preliminary' | 'completion';
  preliminary: ReplySlot;
  completion: ReplySlot;
}

export interface PendingTransfer {
  /** Settles on the 1xx reply that opens the transfer */
  preliminary(): Promise<FtpReply>;
  /** Settles on the 2xx reply sent once the data connection is done */
  completion(): Promise<FtpReply>;
}

const REPLY_LINE = /^(\d{3})([ -])(.*)$/;
const CLOSING_CONTROL_CONNECTION = 421;
const NOOP_OK = 200;

/**
 * FTP control connection with a FIFO of reply waiters.
 *
 * Commands may be pipelined: a NOOP can be sent while a RETR waits for its
 * completion reply. A 200 arriving in that state belongs to the NOOP, every
 * other reply goes to the oldest waiter.
 */
export class FtpControlChannel {
  private socket?: Socket;
  private received = '';
  private multiline?: { code: number; lines: string[] };
  private readonly waiters: ReplyWaiter[] = [];
  private failure?: Error;

  constructor(private readonly options: FtpControlChannelOptions) {}

  get remoteAddress(): string | undefined {
    return this.socket?.remoteAddress;
  }

  isConnected(): boolean {
    return this.socket !== undefined && this.failure === undefined && !this.socket.destroyed;
  }

  /**
   * Connect and wait for the greeting
   */
  async connect(): Promise<FtpReply> {
    const { host, port, timeoutMs } = this.options;
    const greeting = this.enqueue('command', '<greeting>');
    const socket = connect({ host, port });
    this.socket = socket;

    socket.setEncoding('utf8');
    socket.setNoDelay(true);
    socket.on('data', (chunk: string) => this.onData(chunk));
    socket.on('error', (error) => this.fail(new FtpConnectionError(`Control connection error: ${error.message}`, { cause: error })));
    socket.on('close', () => this.fail(new FtpConnectionError('Control connection closed by server')));

    const reply = await this.withTimeout(greeting.completion.wait(), timeoutMs, `Connection to ${host}:${port} timed out`);
    return this.checkReply('CONNECT', reply);
  }

  async login(user: string, password: string): Promise<FtpReply> {
    const userReply = await this.command(`USER ${user}`);
    if (userReply.code === 230) return userReply;
    return this.command(`PASS ${password}`);
  }

  /**
   * Send a command and wait for its final reply; 4xx/5xx replies reject
   */
  command(line: string): Promise<FtpReply> {
    return this.send(line);
  }

  /**
   * Send a NOOP without waiting for it. Servers may hold the reply until the
   * running transfer ends, so it has no timeout; it is matched in order like
   * any other reply and can never close the channel.
   */
  keepAlive(onRejected?: (error: FtpReplyError) => void): void {
    const waiter = this.enqueue('noop', 'NOOP');
    this.write('NOOP');
    waiter.completion.observe((outcome) => {
      if ('reply' in outcome && outcome.reply.code >= 400) {
        onRejected?.(new FtpReplyError('NOOP', outcome.reply));
      }
    });
  }

  /**
   * Send a command that opens a data transfer (RETR, NLST). The data
   * connection must already be established in passive mode.
   */
  startTransfer(line: string): PendingTransfer {
    const waiter = this.enqueue('transfer', line);
    this.write(line);
    return {
      preliminary: () =>
        this.withTimeout(waiter.preliminary.wait(), this.options.timeoutMs, `${line} got no reply`),
      completion: () => waiter.completion.wait().then((reply) => this.checkReply(line, reply)),
    };
  }

  /**
   * Parse a 227 reply into the data port; the host part is ignored in favour
   * of the control connection's peer.
   */
  async enterPassiveMode(): Promise<{ host: string; port: number }> {
    const reply = await this.command('PASV');
    const match = /(\d+),(\d+),(\d+),(\d+),(\d+),(\d+)/.exec(reply.message);
    if (!match) {
      throw new FtpReplyError('PASV', reply);
    }
    const host = this.remoteAddress ?? this.options.host;
    return { host, port: Number(match[5]) * 256 + Number(match[6]) };
  }

  /**
   * QUIT, then close; falls back to destroying the socket
   */
  async quit(): Promise<void> {
    if (!this.isConnected()) {
      this.destroy();
      return;
    }
    try {
      await this.command('QUIT');
    } catch (error) {
      this.trace(`QUIT failed: ${error instanceof Error ? error.message : String(error)}`);
    } finally {
      this.destroy();
    }
  }

  destroy(error?: Error): void {
    this.fail(error ?? new FtpConnectionError('Control connection closed'));
    this.socket?.destroy();
  }

  private async send(line: string): Promise<FtpReply> {
    const waiter = this.enqueue('command', line);
    this.write(line);
    const reply = await this.withTimeout(
      waiter.completion.wait(),
      this.options.timeoutMs,
      `${line.split(' ')[0]} got no reply`,
    );
    return this.checkReply(line, reply);
  }

  private checkReply(line: string, reply: FtpReply): FtpReply {
    if (reply.code >= 400) {
      throw new FtpReplyError(line.startsWith('PASS ') ? 'PASS' : line, reply);
    }
    return reply;
  }

  private enqueue(kind: WaiterKind, command: string): ReplyWaiter {
    const waiter: ReplyWaiter = {
      kind,
      command,
      stage: 'preliminary',
      preliminary: new ReplySlot(),
      completion: new ReplySlot(),
    };
    if (this.failure) {
      waiter.preliminary.settle({ error: this.failure });
      waiter.completion.settle({ error: this.failure });
      return waiter;
    }
    this.waiters.push(waiter);
    return waiter;
  }

  private write(line: string): void {
    if (this.failure || !this.socket) return;
    this.trace(`> ${line.startsWith('PASS ') ? 'PASS ****' : line}`);
    this.socket.write(`${line}\r\n`);
  }

  private onData(chunk: string): void {
    this.received += chunk;
    let newline = this.received.indexOf('\n');
    while (newline !== -1) {
      const line = this.received.slice(0, newline).replace(/\r$/, '');
      this.received = this.received.slice(newline + 1);
      this.onLine(line);
      newline = this.received.indexOf('\n');
    }
  }

  private onLine(line: string): void {
    const match = REPLY_LINE.exec(line);

    if (this.multiline) {
      this.multiline.lines.push(line);
      if (match && Number(match[1]) === this.multiline.code && match[2] === ' ') {
        const { code, lines } = this.multiline;
        this.multiline = undefined;
        this.dispatch({ code, message: lines.join('\n') });
      }
      return;
    }

    if (!match) return;
    const code = Number(match[1]);
    if (match[2] === '-') {
      this.multiline = { code, lines: [match[3]] };
      return;
    }
    this.dispatch({ code, message: match[3] });
  }

  private dispatch(reply: FtpReply): void {
    this.trace(`< ${reply.code} ${reply.message}`);

    let target = this.waiters[0];
    if (target?.kind === 'transfer' && target.stage === 'completion' && reply.code === NOOP_OK) {
      target = this.waiters.find((waiter) => waiter.kind === 'noop') ?? target;
    }

    if (!target) {
      if (reply.code === CLOSING_CONTROL_CONNECTION) {
        this.destroy(new FtpReplyError('<unsolicited>', reply));
      }
      return;
    }

    if (this.deliver(target, reply)) {
      this.waiters.splice(this.waiters.indexOf(target), 1);
    }
  }

  /** Returns true once the waiter got its last reply */
  private deliver(waiter: ReplyWaiter, reply: FtpReply): boolean {
    const preliminary = reply.code < 200;

    if (waiter.kind !== 'transfer') {
      if (preliminary) return false;
      waiter.preliminary.settle({ reply });
      waiter.completion.settle({ reply });
      return true;
    }

    if (waiter.stage === 'preliminary') {
      if (preliminary) {
        waiter.stage = 'completion';
        waiter.preliminary.settle({ reply });
        return false;
      }
      // Rejections and servers that skip the 1xx reply
      waiter.preliminary.settle(reply.code >= 400 ? { error: new FtpReplyError(waiter.command, reply) } : { reply });
      waiter.completion.settle({ reply });
      return true;
    }

    if (preliminary) return false;
    waiter.completion.settle({ reply });
    return true;
  }

  private fail(error: Error): void {
    if (!this.failure) {
      this.failure = error;
    }
    for (const waiter of this.waiters.splice(0)) {
      waiter.preliminary.settle({ error: this.failure });
      waiter.completion.settle({ error: this.failure });
    }
  }

  private async withTimeout<T>(promise: Promise<T>, ms: number, message: string): Promise<T> {
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const error = new FtpConnectionError(message);
        this.destroy(error);
        reject(error);
      }, ms);
    });
    try {
      return await Promise.race([promise, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private trace(line: string): void {
    this.options.trace?.(line);
  }
}
