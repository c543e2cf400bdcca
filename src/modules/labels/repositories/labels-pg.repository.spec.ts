import { Test, TestingModule } from '@nestjs/testing';
import { Label } from '../../../common/interfaces';
import { DatabaseService, Queryable } from '../../../database/database.service';
import { LabelsPgRepository } from './labels-pg.repository';

const label = (date: string, closeT: number, closeTPlus1: number): Label => ({
  ticker: 'AAPL',
  date,
  labelBinary: closeTPlus1 > closeT ? 1 : 0,
  pctReturn: (closeTPlus1 - closeT) / closeT,
  closeT,
  closeTPlus1,
});

describe('LabelsPgRepository', () => {
  let repository: LabelsPgRepository;
  let db: { query: jest.Mock; transaction: jest.Mock };
  let client: { query: jest.Mock };

  beforeEach(async () => {
    client = { query: jest.fn() };
    db = {
      query: jest.fn(),
      transaction: jest.fn(async (work: (client: Queryable) => Promise<unknown>) => work(client)),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [LabelsPgRepository, { provide: DatabaseService, useValue: db }],
    }).compile();

    repository = module.get(LabelsPgRepository);
  });

  describe('insertLabels()', () => {
    it('should tell inserted, rewritten and unchanged labels apart', async () => {
      client.query
        .mockResolvedValueOnce({ rows: [{ inserted: true }] })
        .mockResolvedValueOnce({ rows: [{ inserted: false }] })
        .mockResolvedValueOnce({ rows: [] });

      const outcome = await repository.insertLabels([
        label('2026-03-02', 100, 110),
        label('2026-03-03', 110, 90),
        label('2026-03-04', 90, 95),
      ]);

      expect(outcome).toEqual({ added: 1, updated: 1, duplicates: 1 });
      expect(client.query.mock.calls[0][0]).toContain('ON CONFLICT (ticker, date) DO UPDATE');
      expect(client.query.mock.calls[0][0]).toContain('IS DISTINCT FROM EXCLUDED.close_t_plus_1');
      expect(client.query.mock.calls[0][1]).toEqual(['AAPL', '2026-03-02', 1, 0.1, 100, 110]);
    });

    it('should not open a transaction for an empty batch', async () => {
      expect(await repository.insertLabels([])).toEqual({ added: 0, updated: 0, duplicates: 0 });
      expect(db.transaction).not.toHaveBeenCalled();
    });
  });
});
