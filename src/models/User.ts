/**
 * Registered bank customer
 * nationalId is the unique key; the other fields are display-only text
 */
export interface User {
  fullName: string;
  birthDate: string;
  nationalId: string;
  address: string;
}

/**
 * User registration input
 */
export type RegisterUserInput = User;
