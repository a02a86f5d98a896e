import type { Logger } from '@tetherfs/logging';

import type { DeviceSyncConnection, DeviceSyncTransport } from './types.js';

export interface DeviceSyncConnectorOptions {
  logger?: Logger;
}

/**
 * Owns the single connection to a device. The connection is established on
 * first use and reused afterwards; concurrent callers share one in-flight
 * attempt, and a failed attempt is forgotten so the next call retries.
 */
export class DeviceSyncConnector {
  private static sharedInstance: DeviceSyncConnector | undefined;
  private static teardown: (() => void) | undefined;

  private pending: Promise<DeviceSyncConnection> | undefined;
  private readonly logger: Logger | undefined;

  constructor(
    public readonly transport: DeviceSyncTransport,
    options: DeviceSyncConnectorOptions = {}
  ) {
    this.logger = options.logger;
  }

  /**
   * Install the process-wide connector, torn down when the event loop drains.
   * Replaces any connector installed before.
   */
  static configureShared(
    transport: DeviceSyncTransport,
    options: DeviceSyncConnectorOptions = {}
  ): DeviceSyncConnector {
    DeviceSyncConnector.resetShared();

    const connector = new DeviceSyncConnector(transport, options);
    const teardown = (): void => {
      process.removeListener('beforeExit', teardown);
      DeviceSyncConnector.teardown = undefined;
      connector.disconnect().catch(error => {
        options.logger?.error('Failed to close device connection', error);
      });
    };

    DeviceSyncConnector.sharedInstance = connector;
    DeviceSyncConnector.teardown = teardown;
    process.once('beforeExit', teardown);

    return connector;
  }

  static shared(): DeviceSyncConnector | undefined {
    return DeviceSyncConnector.sharedInstance;
  }

  /**
   * Forget the process-wide connector without closing its connection
   */
  static resetShared(): void {
    if (DeviceSyncConnector.teardown) {
      process.removeListener('beforeExit', DeviceSyncConnector.teardown);
      DeviceSyncConnector.teardown = undefined;
    }
    DeviceSyncConnector.sharedInstance = undefined;
  }

  connect(): Promise<DeviceSyncConnection> {
    if (!this.pending) {
      const attempt = this.establish();
      this.pending = attempt;
      attempt.catch(() => {
        if (this.pending === attempt) {
          this.pending = undefined;
        }
      });
    }
    return this.pending;
  }

  isConnected(): boolean {
    return this.pending !== undefined;
  }

  async disconnect(): Promise<void> {
    const pending = this.pending;
    this.pending = undefined;
    if (!pending) {
      return;
    }

    const connection = await pending.catch(() => undefined);
    if (connection) {
      await connection.disconnect();
      this.logger?.info('Device connection closed', { transport: this.transport.name });
    }
  }

  private async establish(): Promise<DeviceSyncConnection> {
    this.logger?.debug('Connecting to device', { transport: this.transport.name });
    try {
      const connection = await this.transport.connect();
      this.logger?.info('Device connected', { transport: this.transport.name });
      return connection;
    } catch (error) {
      this.logger?.error('Device connection failed', error, { transport: this.transport.name });
      throw error;
    }
  }
}
