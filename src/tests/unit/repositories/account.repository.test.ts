import { AccountRepository } from '@/repositories/account.repository';
import { UserRepository } from '@/repositories/user.repository';
import { NotFoundError } from '@/errors';
import { TRANSACTION_KINDS } from '@/constants/ledger';
import { Transaction } from '@/models';
import { buildAccount, buildUser } from '@/tests/utils/mockRepositories';

describe('AccountRepository', () => {
  let accountRepo: AccountRepository;

  beforeEach(() => {
    accountRepo = new AccountRepository();
  });

  it('should number accounts sequentially from 1 with an empty ledger', () => {
    const owner = buildUser();

    const first = accountRepo.create({ branchCode: '0001', owner });
    const second = accountRepo.create({ branchCode: '0001', owner });

    expect(first).toEqual({
      branchCode: '0001',
      number: 1,
      owner,
      balance: '0.00',
      transactions: [],
      withdrawalsToday: 0,
      lastWithdrawalAt: null,
    });
    expect(second.number).toBe(2);
    expect(second.owner).toBe(first.owner);
  });

  it('should replace stored state on update without changing the order', () => {
    const owner = buildUser();
    accountRepo.create({ branchCode: '0001', owner });
    accountRepo.create({ branchCode: '0001', owner });

    accountRepo.update(buildAccount({ number: 1, owner, balance: '99.00' }));

    expect(accountRepo.findByNumber(1)?.balance).toBe('99.00');
    expect([...accountRepo.findAll()].map((a) => a.number)).toEqual([1, 2]);
  });

  it('should hand out frozen accounts so stored state changes only through update', () => {
    const owner = buildUser();
    accountRepo.create({ branchCode: '0001', owner });
    const transactions: Transaction[] = [
      { kind: TRANSACTION_KINDS.DEPOSIT, amount: '5.00', timestamp: new Date(2026, 0, 1) },
    ];

    accountRepo.update(buildAccount({ number: 1, owner, balance: '5.00', transactions }));
    transactions.push({ kind: TRANSACTION_KINDS.DEPOSIT, amount: '1.00', timestamp: new Date(2026, 0, 2) });

    const stored = accountRepo.findByNumber(1);
    expect(Object.isFrozen(stored)).toBe(true);
    expect(Object.isFrozen(stored?.transactions)).toBe(true);
    expect(stored?.transactions).toHaveLength(1);
  });

  it('should refuse to update an account it never created', () => {
    expect(() => accountRepo.update(buildAccount({ number: 7 }))).toThrow(NotFoundError);
  });

  it('should return null for unknown numbers', () => {
    expect(accountRepo.findByNumber(1)).toBeNull();
  });
});

describe('UserRepository', () => {
  it('should store users by national id and refuse to overwrite', () => {
    const userRepo = new UserRepository();

    userRepo.create(buildUser({ nationalId: '111' }));

    expect(userRepo.findByNationalId('111')?.fullName).toBe('Test User');
    expect(userRepo.findByNationalId('222')).toBeNull();
    expect(() => userRepo.create(buildUser({ nationalId: '111' }))).toThrow(
      'User 111 already stored'
    );
  });
});
