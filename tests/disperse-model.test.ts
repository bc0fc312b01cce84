import { DisperseReceipt } from '../src/core/disperser';
import { DisperseModel } from '../src/db/models';
import logger from '../src/utils/logger';
import { addresses } from './helpers';

jest.mock('../src/db/connection', () => ({
  __esModule: true,
  default: { query: jest.fn() },
}));

const { default: db } = jest.requireMock<{ default: { query: jest.Mock } }>('../src/db/connection');

describe('DisperseModel', () => {
  const [caller, r1, r2, token] = addresses(4);

  const receipt: DisperseReceipt = {
    kind: 'token',
    caller,
    token,
    recipients: [r1, r2],
    amounts: [5n, 25n],
    total: 30n,
    refund: 0n,
    gasUsed: 88_248,
  };

  beforeEach(() => {
    db.query.mockReset();
    jest.restoreAllMocks();
  });

  it('stores the legs as JSON and amounts as decimal strings', async () => {
    const row = { id: 7, kind: 'token', caller };
    db.query.mockResolvedValueOnce({ rows: [row] });

    await expect(DisperseModel.record(receipt)).resolves.toBe(row);

    const [text, params] = db.query.mock.calls[0];
    expect(text).toContain('INSERT INTO disperse_receipts');
    expect(params).toEqual([
      'token',
      caller,
      token,
      JSON.stringify([
        { recipient: r1, amount: '5' },
        { recipient: r2, amount: '25' },
      ]),
      '30',
      '0',
      88_248,
    ]);
  });

  it('stores a native receipt without a token', async () => {
    db.query.mockResolvedValueOnce({ rows: [{ id: 8 }] });

    await DisperseModel.record({ ...receipt, kind: 'native', token: undefined, refund: 3n });

    const [, params] = db.query.mock.calls[0];
    expect(params[0]).toBe('native');
    expect(params[2]).toBeNull();
    expect(params[5]).toBe('3');
  });

  it('logs and re-throws a failed insert', async () => {
    const error = jest.spyOn(logger, 'error').mockImplementation(() => undefined);
    db.query.mockRejectedValueOnce(new Error('relation does not exist'));

    await expect(DisperseModel.record(receipt)).rejects.toThrow('relation does not exist');
    expect(error).toHaveBeenCalledWith(
      'Failed to record disperse receipt',
      expect.objectContaining({ caller })
    );
  });

  it('returns null for an unknown id', async () => {
    db.query.mockResolvedValueOnce({ rows: [] });

    await expect(DisperseModel.findById(404)).resolves.toBeNull();
    expect(db.query).toHaveBeenCalledWith('SELECT * FROM disperse_receipts WHERE id = $1', [404]);
  });

  it('lists a caller receipts newest first with a default limit', async () => {
    db.query.mockResolvedValueOnce({ rows: [{ id: 2 }, { id: 1 }] });

    const rows = await DisperseModel.findByCaller(caller);

    expect(rows).toHaveLength(2);
    expect(db.query).toHaveBeenCalledWith(
      'SELECT * FROM disperse_receipts WHERE caller = $1 ORDER BY created_at DESC LIMIT $2',
      [caller, 50]
    );
  });
});
