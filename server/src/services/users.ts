import type { PasswordHasher, TokenPair, TokenService } from '../auth';
import type { Store, UserPatch } from '../db/store';
import { AuthenticationError, ValidationError } from '../errors';
import type { Role, User } from '../types';

export interface RegistrationInput {
  username: string;
  email: string;
  firstName: string;
  lastName: string;
  password: string;
  passwordConfirm: string;
  role: Role;
}

export interface Session {
  user: User;
  tokens: TokenPair;
}

export const MIN_PASSWORD_LENGTH = 8;

export class UserService {
  constructor(
    private readonly store: Store,
    private readonly tokens: TokenService,
    private readonly passwords: PasswordHasher
  ) {}

  async register(input: RegistrationInput): Promise<Session> {
    if (input.password.length < MIN_PASSWORD_LENGTH) {
      throw ValidationError.field('password', `Ensure this field has at least ${MIN_PASSWORD_LENGTH} characters.`);
    }
    if (input.password !== input.passwordConfirm) {
      throw ValidationError.field('password_confirm', "Passwords don't match");
    }
    if (await this.store.findUserByUsername(input.username)) {
      throw ValidationError.field('username', 'A user with that username already exists.');
    }

    const passwordHash = await this.passwords.hash(input.password);
    const user = await this.store.createUser({
      username: input.username,
      email: input.email,
      firstName: input.firstName,
      lastName: input.lastName,
      role: input.role,
      passwordHash
    });
    return { user, tokens: this.tokens.issue(user.id) };
  }

  /** Checks credentials and records a `user_login` behavior event. */
  async login(username: string, password: string, ipAddress: string | null): Promise<Session> {
    const user = await this.store.findUserByUsername(username);
    if (!user || !(await this.passwords.verify(password, user.passwordHash))) {
      throw new AuthenticationError('Invalid credentials');
    }
    await this.store.appendBehavior({
      userId: user.id,
      actionType: 'user_login',
      taskId: null,
      durationSeconds: null,
      metadata: { ip_address: ipAddress }
    });
    return { user, tokens: this.tokens.issue(user.id) };
  }

  async refresh(refreshToken: string): Promise<{ access: string }> {
    const userId = this.tokens.verify(refreshToken, 'refresh');
    const user = await this.store.findUserById(userId);
    if (!user) throw new AuthenticationError('User not found');
    return { access: this.tokens.sign(user.id, 'access') };
  }

  async updateProfile(user: User, patch: UserPatch): Promise<User> {
    const updated = await this.store.updateUser(user.id, patch);
    if (!updated) throw new AuthenticationError('User not found');
    return updated;
  }

  list(): Promise<User[]> {
    return this.store.listUsers();
  }
}
