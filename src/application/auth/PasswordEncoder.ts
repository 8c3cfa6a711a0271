// Application: Password encoder
// bcrypt hashing behind an interface so services never touch the algorithm

import bcrypt from 'bcryptjs';

export interface PasswordEncoder {
  encode(rawPassword: string): Promise<string>;
  matches(rawPassword: string, passwordHash: string): Promise<boolean>;
}

export class BcryptPasswordEncoder implements PasswordEncoder {
  constructor(private readonly rounds: number = 10) {}

  async encode(rawPassword: string): Promise<string> {
    return bcrypt.hash(rawPassword, this.rounds);
  }

  async matches(rawPassword: string, passwordHash: string): Promise<boolean> {
    return bcrypt.compare(rawPassword, passwordHash);
  }
}
