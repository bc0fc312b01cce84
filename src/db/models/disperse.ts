import db from '../connection';
import logger from '../../utils/logger';
import { DisperseKind, DisperseReceipt } from '../../core/disperser/types';

/**
 * Stored leg; amounts are decimal strings in JSONB
 */
export interface StoredLeg {
  recipient: string;
  amount: string;
}

/**
 * Disperse receipt row
 */
export interface DisperseRecord {
  id: number;
  kind: DisperseKind;
  caller: string;
  token: string | null;
  legs: StoredLeg[];
  total: string;
  refund: string;
  gas_used: number;
  created_at: Date;
}

/**
 * Disperse Receipt Model
 */
export class DisperseModel {
  /**
   * Store a committed receipt
   */
  static async record(receipt: DisperseReceipt): Promise<DisperseRecord> {
    const legs: StoredLeg[] = receipt.recipients.map((recipient, i) => ({
      recipient,
      amount: receipt.amounts[i].toString(),
    }));

    try {
      const result = await db.query<DisperseRecord>(
        `INSERT INTO disperse_receipts (kind, caller, token, legs, total, refund, gas_used)
         VALUES ($1, $2, $3, $4, $5, $6, $7)
         RETURNING *`,
        [
          receipt.kind,
          receipt.caller,
          receipt.token ?? null,
          JSON.stringify(legs),
          receipt.total.toString(),
          receipt.refund.toString(),
          receipt.gasUsed,
        ]
      );

      return result.rows[0];
    } catch (error) {
      logger.error('Failed to record disperse receipt', { caller: receipt.caller, error });
      throw error;
    }
  }

  /**
   * Find receipt by ID
   */
  static async findById(id: number): Promise<DisperseRecord | null> {
    try {
      const result = await db.query<DisperseRecord>(
        'SELECT * FROM disperse_receipts WHERE id = $1',
        [id]
      );

      return result.rows[0] || null;
    } catch (error) {
      logger.error('Failed to find disperse receipt by id', { id, error });
      throw error;
    }
  }

  /**
   * Most recent receipts of a caller
   */
  static async findByCaller(caller: string, limit: number = 50): Promise<DisperseRecord[]> {
    try {
      const result = await db.query<DisperseRecord>(
        'SELECT * FROM disperse_receipts WHERE caller = $1 ORDER BY created_at DESC LIMIT $2',
        [caller, limit]
      );

      return result.rows;
    } catch (error) {
      logger.error('Failed to find disperse receipts by caller', { caller, error });
      throw error;
    }
  }
}
