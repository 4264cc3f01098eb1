import { UserService } from '@/services/user.service';
import { createMockUserRepository, buildUser } from '@/tests/utils/mockRepositories';
import { expectOk, expectFail } from '@/tests/utils/outcome';
import { IUserRepository } from '@/repositories/interfaces';
import { ERROR_CODES } from '@/constants/ledger';
import { ConflictError, ValidationError } from '@/errors';

describe('UserService', () => {
  let userService: UserService;
  let mockUserRepo: jest.Mocked<IUserRepository>;

  beforeEach(() => {
    mockUserRepo = createMockUserRepository();
    userService = new UserService(mockUserRepo);
  });

  describe('register', () => {
    it('should store a new user with trimmed fields', () => {
      mockUserRepo.findByNationalId.mockReturnValue(null);

      const user = expectOk(
        userService.register({
          fullName: '  Ana Souza ',
          birthDate: '12/03/1990',
          nationalId: ' 111 ',
          address: 'Rua A, 1 - Centro - Recife/PE',
        })
      );

      expect(user).toEqual({
        fullName: 'Ana Souza',
        birthDate: '12/03/1990',
        nationalId: '111',
        address: 'Rua A, 1 - Centro - Recife/PE',
      });
      expect(mockUserRepo.findByNationalId).toHaveBeenCalledWith('111');
      expect(mockUserRepo.create).toHaveBeenCalledTimes(1);
    });

    it('should reject a national id that is already registered', () => {
      mockUserRepo.findByNationalId.mockReturnValue(buildUser({ nationalId: '111' }));

      const error = expectFail(userService.register(buildUser({ fullName: 'Someone Else' })));

      expect(error).toBeInstanceOf(ConflictError);
      expect(error.code).toBe(ERROR_CODES.DUPLICATE_USER);
      expect(error.message).toBe('A user with national id 111 already exists');
      expect(mockUserRepo.create).not.toHaveBeenCalled();
    });

    it('should reject blank fields with INVALID_INPUT', () => {
      const error = expectFail(userService.register(buildUser({ address: '   ' })));

      expect(error).toBeInstanceOf(ValidationError);
      expect(error.code).toBe(ERROR_CODES.INVALID_INPUT);
      expect(error.message).toBe('Address is required');
      expect(mockUserRepo.findByNationalId).not.toHaveBeenCalled();
    });
  });

  describe('find', () => {
    it('should look up by trimmed national id', () => {
      const user = buildUser();
      mockUserRepo.findByNationalId.mockReturnValue(user);

      expect(userService.find(' 111 ')).toBe(user);
      expect(mockUserRepo.findByNationalId).toHaveBeenCalledWith('111');
    });

    it('should return null for an unknown national id', () => {
      mockUserRepo.findByNationalId.mockReturnValue(null);

      expect(userService.find('999')).toBeNull();
    });
  });
});
