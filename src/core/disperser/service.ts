import config, { Config, validateConfig } from '../../config';
import { PgLedgerStore } from '../../db/ledger';
import { DisperseModel } from '../../db/models/disperse';
import logger from '../../utils/logger';
import { DisperseError, errorMessage } from '../errors';
import { Address, LedgerStore } from '../ledger/types';
import { MemoryLedgerStore } from '../ledger/memory';
import { Runtime } from '../runtime';
import { parseAddress } from './batch';
import { Disperser } from './disperser';
import { Batch, DisperseReceipt, RescueResult } from './types';

/**
 * Where committed receipts go
 */
export interface ReceiptRecorder {
  record(receipt: DisperseReceipt): Promise<unknown>;
}

export interface DisperserServiceOptions {
  runtime?: Runtime;
  store?: LedgerStore;
  address?: Address;
  // null disables recording even when RECORD_RECEIPTS is set
  recorder?: ReceiptRecorder | null;
}

/**
 * Pick the ledger backend named in config
 */
export function createLedgerStore(cfg: Config = config): LedgerStore {
  return cfg.ledger.backend === 'postgres' ? new PgLedgerStore() : new MemoryLedgerStore();
}

/**
 * Disperser Service
 *
 * Application-facing wrapper around the disperser: logs every call,
 * records committed receipts and leaves the engine itself free of logging.
 */
export class DisperserService {
  readonly runtime: Runtime;
  readonly disperser: Disperser;
  private readonly recorder: ReceiptRecorder | null;

  constructor(options: DisperserServiceOptions = {}) {
    this.runtime = options.runtime ?? new Runtime(options.store ?? createLedgerStore());
    this.disperser = new Disperser(
      this.runtime,
      parseAddress(options.address ?? config.disperser.address)
    );

    if (options.recorder !== undefined) {
      this.recorder = options.recorder;
    } else {
      this.recorder = config.disperser.recordReceipts ? DisperseModel : null;
    }
  }

  get address(): Address {
    return this.disperser.address;
  }

  /**
   * Disperse native value; `value` is what the caller attaches
   */
  async sendNative(caller: Address, batch: Batch, value: bigint): Promise<DisperseReceipt> {
    let receipt: DisperseReceipt;
    try {
      receipt = await this.disperser.sendNative(caller, batch.recipients, batch.amounts, value);
    } catch (error) {
      this.logFailure('Native disperse failed', 'disperse_native', caller, error);
      throw error;
    }

    logger.transaction('Native disperse confirmed', {
      type: 'disperse_native',
      status: 'confirmed',
      caller,
      legs: receipt.recipients.length,
      total: receipt.total,
      refund: receipt.refund,
      gasUsed: receipt.gasUsed,
    });

    if (receipt.refund > 0n) {
      logger.transaction('Surplus refunded', {
        type: 'refund',
        status: 'confirmed',
        to: caller,
        amount: receipt.refund,
      });
    }

    await this.record(receipt);
    return receipt;
  }

  /**
   * Disperse `token` from the caller's balance using its allowance
   */
  async sendToken(caller: Address, token: Address, batch: Batch): Promise<DisperseReceipt> {
    let receipt: DisperseReceipt;
    try {
      receipt = await this.disperser.sendToken(caller, token, batch.recipients, batch.amounts);
    } catch (error) {
      this.logFailure('Token disperse failed', 'disperse_token', caller, error, token);
      throw error;
    }

    logger.transaction('Token disperse confirmed', {
      type: 'disperse_token',
      status: 'confirmed',
      caller,
      token,
      legs: receipt.recipients.length,
      total: receipt.total,
      gasUsed: receipt.gasUsed,
    });

    await this.record(receipt);
    return receipt;
  }

  async rescueNative(caller: Address): Promise<RescueResult> {
    const result = await this.disperser.rescueNative(caller);

    if (result.delivered) {
      logger.transaction('Native balance rescued', {
        type: 'rescue_native',
        status: 'confirmed',
        to: caller,
        amount: result.swept,
      });
    } else {
      logger.warn('Native rescue not delivered; balance left in place', { caller });
    }

    return result;
  }

  async rescueToken(caller: Address, token: Address): Promise<RescueResult> {
    try {
      const result = await this.disperser.rescueToken(caller, token);
      logger.transaction('Token balance rescued', {
        type: 'rescue_token',
        status: 'confirmed',
        to: caller,
        token,
        amount: result.swept,
      });
      return result;
    } catch (error) {
      this.logFailure('Token rescue failed', 'rescue_token', caller, error, token);
      throw error;
    }
  }

  private async record(receipt: DisperseReceipt): Promise<void> {
    if (!this.recorder) return;

    try {
      await this.recorder.record(receipt);
    } catch (error) {
      logger.error('Disperse committed but receipt was not recorded', {
        caller: receipt.caller,
        kind: receipt.kind,
        error,
      });
      throw error;
    }
  }

  private logFailure(
    message: string,
    type: 'disperse_native' | 'disperse_token' | 'rescue_token',
    caller: Address,
    error: unknown,
    token?: Address
  ): void {
    logger.transaction(message, {
      type,
      status: 'failed',
      caller,
      token,
      error: errorMessage(error),
      code: error instanceof DisperseError ? error.code : undefined,
    });
  }
}

/**
 * Build a service from environment config
 */
export function createDisperserService(options: DisperserServiceOptions = {}): DisperserService {
  validateConfig();
  return new DisperserService(options);
}
