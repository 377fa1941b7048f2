import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  FtpControlChannel,
  FtpReplyError,
} from '../../../src/infrastructure/adapters/transfer/ftp-control-channel';
import { FakeFtpServer } from '../../in-memory-adapters';

describe('FtpControlChannel', () => {
  let server: FakeFtpServer;
  let channel: FtpControlChannel;

  const connectTo = async (greeting?: string) => {
    server = new FakeFtpServer({ directories: { '/pub': {} }, greeting });
    const port = await server.start();
    channel = new FtpControlChannel({ host: '127.0.0.1', port, timeoutMs: 2000 });
    return channel.connect();
  };

  afterEach(async () => {
    channel.destroy();
    await server.stop();
  });

  it('should join the lines of a multiline reply', async () => {
    const greeting = await connectTo('220-Welcome\r\n220-Anonymous access only\r\n220 Ready\r\n');

    expect(greeting).toEqual({ code: 220, message: 'Welcome\n220-Anonymous access only\n220 Ready' });
  });

  it('should send the password when the server asks for it', async () => {
    await connectTo();

    await expect(channel.login('anonymous', 'anonymous@')).resolves.toEqual({
      code: 230,
      message: 'Login successful',
    });
    expect(server.commands).toEqual(['USER anonymous', 'PASS anonymous@']);
  });

  it('should reject 4xx and 5xx replies', async () => {
    await connectTo();

    const error = await channel.command('CWD /missing').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(FtpReplyError);
    expect(error).toHaveProperty('reply', { code: 550, message: '/missing: No such file or directory' });
  });

  it('should take the data port from the PASV reply and the host from the peer', async () => {
    await connectTo();

    const { host, port } = await channel.enterPassiveMode();

    expect(host).toBe('127.0.0.1');
    expect(port).toBeGreaterThan(0);
  });

  it('should match a keepalive reply in order without waiting for it', async () => {
    await connectTo();
    const onRejected = vi.fn();

    channel.keepAlive(onRejected);

    await expect(channel.command('TYPE I')).resolves.toEqual({ code: 200, message: 'Type set to I' });
    expect(server.commands).toEqual(['NOOP', 'TYPE I']);
    expect(onRejected).not.toHaveBeenCalled();
  });

  it('should close when the server announces it is closing', async () => {
    await connectTo();
    expect(channel.isConnected()).toBe(true);

    server.broadcast('421 Timeout');

    await vi.waitFor(() => expect(channel.isConnected()).toBe(false));
    await expect(channel.command('NOOP')).rejects.toHaveProperty('message', '<unsolicited> rejected: 421 Timeout');
  });
});
