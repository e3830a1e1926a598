/**
 * node-ssh backed SSH Transport
 */

import { NodeSSH } from 'node-ssh';

import {
  SshTransportError,
  channelOpenTimeout,
  type ExecChannelOptions,
  type SftpClient,
  type SshChannel,
  type SshConnectOptions,
  type SshConnection,
  type SshTransport,
} from './transport.js';

/** Terminal geometry requested for interactive commands */
const PTY = { term: 'xterm-256color', rows: 24, cols: 80 };

/** SFTP status code for a missing path */
const SFTP_NO_SUCH_FILE = 2;

type Sftp = Awaited<ReturnType<NodeSSH['requestSFTP']>>;

interface RemoteStream {
  write(data: string): unknown;
  destroy(): unknown;
}

function errorLevel(error: Error): string | null {
  if ('level' in error && typeof error.level === 'string') {
    return error.level;
  }
  return null;
}

function errorCode(error: Error): unknown {
  return 'code' in error ? error.code : undefined;
}

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Map a client connect error onto a transport failure kind.
 */
export function classifyClientError(error: Error): SshTransportError {
  const level = errorLevel(error);
  if (level === 'client-authentication') {
    return new SshTransportError(`Authentication failed: ${error.message}`, 'auth');
  }
  if (level === 'client-timeout' || errorCode(error) === 'ETIMEDOUT') {
    return new SshTransportError(`Timed out while connecting: ${error.message}`, 'timeout');
  }
  if (level === 'client-socket' || level === 'client-dns' || typeof errorCode(error) === 'string') {
    return new SshTransportError(`Connection failed: ${error.message}`, 'transport');
  }
  return new SshTransportError(error.message, 'transport');
}

/**
 * Buffers output from the exec callbacks; closed once the command settles.
 * Input written before the channel opens is queued.
 */
class NodeSshChannel implements SshChannel {
  private stdout = '';
  private stderr = '';
  private closed = false;
  private status: number | null = null;
  private stream: RemoteStream | null = null;
  private pending: string[] = [];

  attach(stream: RemoteStream): void {
    this.stream = stream;
    for (const data of this.pending) {
      stream.write(data);
    }
    this.pending = [];
  }

  appendStdout(chunk: Buffer): void {
    this.stdout += chunk.toString('utf-8');
  }

  appendStderr(chunk: Buffer): void {
    this.stderr += chunk.toString('utf-8');
  }

  finish(code: number | null): void {
    this.status = code;
    this.closed = true;
  }

  read(): { stdout: string; stderr: string } {
    const chunk = { stdout: this.stdout, stderr: this.stderr };
    this.stdout = '';
    this.stderr = '';
    return chunk;
  }

  isClosed(): boolean {
    return this.closed;
  }

  exitStatus(): number | null {
    return this.status;
  }

  write(data: string): void {
    if (this.stream) {
      this.stream.write(data);
    } else {
      this.pending.push(data);
    }
  }

  close(): void {
    if (!this.closed) {
      this.stream?.destroy();
    }
  }
}

class NodeSshSftp implements SftpClient {
  constructor(
    private readonly ssh: NodeSSH,
    private readonly sftp: Sftp
  ) {}

  exists(remotePath: string): Promise<boolean> {
    return new Promise<boolean>((resolve, reject) => {
      this.sftp.stat(remotePath, (error) => {
        if (!error) {
          resolve(true);
        } else if (errorCode(error) === SFTP_NO_SUCH_FILE) {
          resolve(false);
        } else {
          reject(new SshTransportError(`stat ${remotePath} failed: ${error.message}`, 'remote'));
        }
      });
    });
  }

  async mkdir(remotePath: string): Promise<void> {
    try {
      await this.ssh.mkdir(remotePath, 'sftp', this.sftp);
    } catch (error) {
      throw new SshTransportError(`mkdir ${remotePath} failed: ${messageOf(error)}`, 'remote');
    }
  }

  async put(localPath: string, remotePath: string): Promise<void> {
    try {
      await this.ssh.putFile(localPath, remotePath, this.sftp);
    } catch (error) {
      throw new SshTransportError(`Upload to ${remotePath} failed: ${messageOf(error)}`, 'remote');
    }
  }

  close(): void {
    this.sftp.end();
  }
}

class NodeSshConnection implements SshConnection {
  constructor(private readonly ssh: NodeSSH) {}

  /**
   * Resolves once the channel is open. A failure to open, or no channel
   * within `openTimeoutMs`, rejects; a later failure closes the channel
   * without an exit status.
   */
  exec(command: string, options: ExecChannelOptions): Promise<SshChannel> {
    const channel = new NodeSshChannel();

    return new Promise<SshChannel>((resolve, reject) => {
      let settled = false;
      const timer = setTimeout(() => {
        settled = true;
        channel.close();
        reject(channelOpenTimeout(options.openTimeoutMs));
      }, options.openTimeoutMs);

      void this.ssh
        .execCommand(command, {
          execOptions: options.pty ? { pty: PTY } : {},
          noTrim: true,
          onChannel: (stream) => {
            channel.attach(stream);
            if (settled) {
              // opened after the caller gave up
              stream.destroy();
              return;
            }
            settled = true;
            clearTimeout(timer);
            resolve(channel);
          },
          onStdout: (chunk) => channel.appendStdout(chunk),
          onStderr: (chunk) => channel.appendStderr(chunk),
        })
        .then(
          (response) => channel.finish(response.code),
          (error: unknown) => {
            channel.finish(null);
            if (!settled) {
              settled = true;
              clearTimeout(timer);
              reject(new SshTransportError(`Failed to open exec channel: ${messageOf(error)}`, 'transport'));
            }
          }
        );
    });
  }

  async sftp(): Promise<SftpClient> {
    try {
      return new NodeSshSftp(this.ssh, await this.ssh.requestSFTP());
    } catch (error) {
      throw new SshTransportError(`Failed to open SFTP subsystem: ${messageOf(error)}`, 'transport');
    }
  }

  close(): void {
    this.ssh.dispose();
  }
}

/**
 * Opens one client per call. Host keys are not verified.
 */
export class NodeSshTransport implements SshTransport {
  async connect(options: SshConnectOptions): Promise<SshConnection> {
    const ssh = new NodeSSH();
    try {
      await ssh.connect({
        host: options.host,
        port: options.port,
        username: options.username,
        privateKey: options.privateKey.toString('utf-8'),
        passphrase: options.passphrase,
        readyTimeout: options.readyTimeoutMs,
      });
    } catch (error) {
      ssh.dispose();
      throw error instanceof Error ? classifyClientError(error) : new SshTransportError(String(error), 'transport');
    }
    return new NodeSshConnection(ssh);
  }
}
