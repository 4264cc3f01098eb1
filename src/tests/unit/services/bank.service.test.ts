import { BankService } from '@/services/bank.service';
import {
  createMockAccountRepository,
  createMockUserRepository,
  buildAccount,
  buildUser,
} from '@/tests/utils/mockRepositories';
import { expectOk, expectFail } from '@/tests/utils/outcome';
import { IAccountRepository, IUserRepository } from '@/repositories/interfaces';
import { ERROR_CODES } from '@/constants/ledger';
import { NotFoundError } from '@/errors';

describe('BankService', () => {
  let bankService: BankService;
  let mockAccountRepo: jest.Mocked<IAccountRepository>;
  let mockUserRepo: jest.Mocked<IUserRepository>;

  beforeEach(() => {
    mockAccountRepo = createMockAccountRepository();
    mockUserRepo = createMockUserRepository();
    bankService = new BankService(mockAccountRepo, mockUserRepo);
  });

  describe('openAccount', () => {
    it('should create an account on the configured branch for a registered user', () => {
      const owner = buildUser();
      const created = buildAccount({ owner });
      mockUserRepo.findByNationalId.mockReturnValue(owner);
      mockAccountRepo.create.mockReturnValue(created);

      const account = expectOk(bankService.openAccount('111'));

      expect(account).toBe(created);
      expect(mockAccountRepo.create).toHaveBeenCalledWith({ branchCode: '0001', owner });
    });

    it('should use the branch code it was built with', () => {
      const owner = buildUser();
      mockUserRepo.findByNationalId.mockReturnValue(owner);
      mockAccountRepo.create.mockReturnValue(buildAccount({ branchCode: '0042', owner }));

      new BankService(mockAccountRepo, mockUserRepo, '0042').openAccount('111');

      expect(mockAccountRepo.create).toHaveBeenCalledWith({ branchCode: '0042', owner });
    });

    it('should report USER_NOT_FOUND and allocate nothing for an unknown user', () => {
      mockUserRepo.findByNationalId.mockReturnValue(null);

      const error = expectFail(bankService.openAccount('999'));

      expect(error).toBeInstanceOf(NotFoundError);
      expect(error.code).toBe(ERROR_CODES.USER_NOT_FOUND);
      expect(error.message).toBe('No user found with national id 999');
      expect(mockAccountRepo.create).not.toHaveBeenCalled();
    });
  });

  describe('listAccounts', () => {
    it('should not touch the repository until iterated', () => {
      bankService.listAccounts();

      expect(mockAccountRepo.findAll).not.toHaveBeenCalled();
    });

    it('should yield summaries in repository order, restarting on every loop', () => {
      const accounts = [
        buildAccount({ number: 1, balance: '10.00' }),
        buildAccount({
          number: 2,
          owner: buildUser({ fullName: 'Bruno Lima', nationalId: '222' }),
        }),
      ];
      mockAccountRepo.findAll.mockImplementation(() => accounts.values());

      const listing = bankService.listAccounts();

      const expected = [
        { branchCode: '0001', number: 1, holderName: 'Test User', nationalId: '111', balance: '10.00' },
        { branchCode: '0001', number: 2, holderName: 'Bruno Lima', nationalId: '222', balance: '0.00' },
      ];
      expect([...listing]).toEqual(expected);
      expect([...listing]).toEqual(expected);
      expect(mockAccountRepo.findAll).toHaveBeenCalledTimes(2);
    });
  });

  describe('findByNumber / requireAccount', () => {
    it('should return the stored account', () => {
      const account = buildAccount({ number: 3 });
      mockAccountRepo.findByNumber.mockReturnValue(account);

      expect(bankService.findByNumber(3)).toBe(account);
      expect(expectOk(bankService.requireAccount(3))).toBe(account);
    });

    it('should report ACCOUNT_NOT_FOUND for an unknown number', () => {
      mockAccountRepo.findByNumber.mockReturnValue(null);

      expect(bankService.findByNumber(5)).toBeNull();
      const error = expectFail(bankService.requireAccount(5));
      expect(error.code).toBe(ERROR_CODES.ACCOUNT_NOT_FOUND);
      expect(error.message).toBe('Account 5 not found');
    });
  });
});
