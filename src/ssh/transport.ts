/**
 * SSH Transport Contract
 *
 * What the session layer needs from an SSH client library. The production
 * implementation wraps node-ssh; tests provide an in-process fake.
 */

export interface SshConnectOptions {
  host: string;
  port: number;
  username: string;
  privateKey: Buffer;
  passphrase?: string;
  /** Time allowed for TCP connect plus handshake and auth */
  readyTimeoutMs: number;
}

export interface ExecChannelOptions {
  pty: boolean;
  /** The channel must open within this time or the exec fails with a timeout */
  openTimeoutMs: number;
}

/**
 * A running remote command. Output is buffered by the transport and
 * drained by polling.
 */
export interface SshChannel {
  /** Output received since the previous call */
  read(): { stdout: string; stderr: string };
  /** True once the channel has closed and all output has arrived */
  isClosed(): boolean;
  /** Exit status reported by the remote side, if any */
  exitStatus(): number | null;
  write(data: string): void;
  close(): void;
}

export interface SftpClient {
  exists(remotePath: string): Promise<boolean>;
  mkdir(remotePath: string): Promise<void>;
  put(localPath: string, remotePath: string): Promise<void>;
  close(): void;
}

export interface SshConnection {
  exec(command: string, options: ExecChannelOptions): Promise<SshChannel>;
  sftp(): Promise<SftpClient>;
  close(): void;
}

export interface SshTransport {
  connect(options: SshConnectOptions): Promise<SshConnection>;
}

/**
 * Connection-level failure raised by a transport.
 */
export class SshTransportError extends Error {
  constructor(
    message: string,
    public readonly kind: 'auth' | 'transport' | 'timeout' | 'remote'
  ) {
    super(message);
    this.name = 'SshTransportError';
  }
}

export function channelOpenTimeout(timeoutMs: number): SshTransportError {
  return new SshTransportError(`Exec channel did not open within ${timeoutMs}ms`, 'timeout');
}
