// Domain: User types
// Pure TypeScript interfaces for accounts, roles and activation codes

/**
 * User account. Created disabled at registration, enabled after activation.
 */
export interface User {
  id: string;                    // UUID
  firstname: string;
  lastname: string;
  email: string;                 // Unique, compared case-insensitively
  passwordHash: string;          // bcrypt hash
  enabled: boolean;              // false until the activation code is confirmed
  accountLocked: boolean;
  roles: string[];               // Role names, e.g. ['USER']
  createdAt: Date;
  lastModifiedAt: Date | null;
}

// Role every registered account receives; must be seeded before registration
export const DEFAULT_ROLE = 'USER';

export interface Role {
  id: string;
  name: string;
  createdAt: Date;
}

/**
 * One-time numeric code proving control of the registered email
 */
export interface ActivationToken {
  id: string;
  token: string;                 // 6-digit numeric code
  createdAt: Date;
  expiredAt: Date;
  validatedAt: Date | null;
  userId: string;
}

export type AccountState = 'PENDING' | 'ACTIVE';

export function accountStateOf(user: Pick<User, 'enabled'>): AccountState {
  return user.enabled ? 'ACTIVE' : 'PENDING';
}

export function fullName(user: Pick<User, 'firstname' | 'lastname'>): string {
  return `${user.firstname} ${user.lastname}`;
}

/**
 * Registration data
 */
export interface RegistrationRequest {
  firstname: string;
  lastname: string;
  email: string;
  password: string;
}

/**
 * Login credentials
 */
export interface AuthenticationRequest {
  email: string;
  password: string;
}

export interface AuthenticationResponse {
  token: string;
}

export interface ChangePasswordRequest {
  currentPassword: string;
  newPassword: string;
  confirmationPassword: string;
}

/**
 * User without sensitive data
 */
export interface PublicUser {
  id: string;
  firstname: string;
  lastname: string;
  email: string;
}

export function toPublicUser(user: User): PublicUser {
  return {
    id: user.id,
    firstname: user.firstname,
    lastname: user.lastname,
    email: user.email,
  };
}
