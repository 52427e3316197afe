/**
 * User model
 *
 * Passwords are stored as given and never leave the service in a response.
 */

export type UserRole = 'read' | 'write';

export const USER_ROLES: readonly UserRole[] = ['read', 'write'];

export type User = {
  id: number;
  username: string;
  password: string;
  role: UserRole;
  createdAt: Date;
  updatedAt: Date;
};

export type NewUser = Omit<User, 'id'>;

export type UserRow = {
  id: number;
  username: string;
  password: string;
  role: UserRole;
  created_at: Date;
  updated_at: Date;
};

export type UserJSON = {
  id: number;
  username: string;
  role: UserRole;
  created_at: Date;
  updated_at: Date;
};

export function isValidRole(role: string): role is UserRole {
  return USER_ROLES.some((valid) => valid === role);
}

export function toUser(row: UserRow): User {
  return {
    id: row.id,
    username: row.username,
    password: row.password,
    role: row.role,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

export function serializeUser(user: User): UserJSON {
  return {
    id: user.id,
    username: user.username,
    role: user.role,
    created_at: user.createdAt,
    updated_at: user.updatedAt,
  };
}
