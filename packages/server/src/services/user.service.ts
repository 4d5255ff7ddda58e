import bcrypt from 'bcryptjs';
import type { Database } from 'better-sqlite3';
import { info } from 'firebase-functions/logger';
import type { AuthUser, User, UserProfile } from '../types/index.js';
import { NotFoundError, ValidationError } from '../types/errors.js';
import type {
  ChangePasswordInput,
  CreateUserInput,
  TokenRequestInput,
  UpdateUserInput,
} from '../schemas/user.schema.js';
import type { AuthTokenRepository, UserRepository } from '../repositories/index.js';
import { isUniqueConstraintError, runInTransaction } from '../db/index.js';
import { normalizeEmail } from '../utils/email.js';

export interface UserServiceDeps {
  db: Database;
  users: UserRepository;
  tokens: AuthTokenRepository;
  bcryptRounds: number;
}

export interface NewUser {
  email: string;
  password: string;
  name?: string;
}

export interface IssuedToken {
  token: string;
}

const DUPLICATE_EMAIL = 'user with this email already exists.';
const BAD_CREDENTIALS = 'Unable to authenticate with provided credentials.';

export function toProfile(user: Pick<User, 'id' | 'email' | 'name'>): UserProfile {
  return { id: user.id, email: user.email, name: user.name };
}

export class UserService {
  private db: Database;
  private users: UserRepository;
  private tokens: AuthTokenRepository;
  private bcryptRounds: number;

  constructor(deps: UserServiceDeps) {
    this.db = deps.db;
    this.users = deps.users;
    this.tokens = deps.tokens;
    this.bcryptRounds = deps.bcryptRounds;
  }

  async register(input: CreateUserInput): Promise<UserProfile> {
    const user = await this.createUser(input);
    info('User registered', { userId: user.id });
    return toProfile(user);
  }

  /**
   * Create a regular user. The email is required; its domain part is
   * lower-cased before storing.
   */
  async createUser(input: NewUser, flags: { is_staff?: boolean; is_superuser?: boolean } = {}): Promise<User> {
    const email = normalizeEmail(input.email);
    if (email.length === 0) {
      throw ValidationError.forField('email', 'Users must have an email address.');
    }
    if (this.users.findByEmail(email)) {
      throw ValidationError.forField('email', DUPLICATE_EMAIL);
    }

    const passwordHash = await bcrypt.hash(input.password, this.bcryptRounds);

    try {
      return this.users.create({
        email,
        password_hash: passwordHash,
        name: input.name ?? '',
        ...flags,
      });
    } catch (error) {
      if (isUniqueConstraintError(error)) {
        throw ValidationError.forField('email', DUPLICATE_EMAIL);
      }
      throw error;
    }
  }

  async createSuperuser(input: NewUser): Promise<User> {
    const user = await this.createUser(input, { is_staff: true, is_superuser: true });
    info('Superuser created', { userId: user.id });
    return user;
  }

  /** Returns the user's token, creating it on first successful login. */
  async issueToken(input: TokenRequestInput): Promise<IssuedToken> {
    const user = this.users.findByEmail(normalizeEmail(input.email));
    const valid = user !== null && user.is_active && (await bcrypt.compare(input.password, user.password_hash));
    if (!user || !valid) {
      throw ValidationError.forField('non_field_errors', BAD_CREDENTIALS);
    }

    const token = this.tokens.findByUserId(user.id) ?? this.tokens.create(user.id);
    return { token: token.key };
  }

  getProfile(userId: number): UserProfile {
    return toProfile(this.requireUser(userId));
  }

  async updateProfile(userId: number, input: UpdateUserInput): Promise<UserProfile> {
    this.requireUser(userId);

    const email = input.email === undefined ? undefined : normalizeEmail(input.email);
    if (email !== undefined) {
      const owner = this.users.findByEmail(email);
      if (owner && owner.id !== userId) {
        throw ValidationError.forField('email', DUPLICATE_EMAIL);
      }
    }

    const passwordHash =
      input.password === undefined ? undefined : await bcrypt.hash(input.password, this.bcryptRounds);

    try {
      const updated = this.users.update(userId, {
        email,
        name: input.name,
        password_hash: passwordHash,
      });
      if (!updated) {
        throw new NotFoundError('User', userId);
      }
      return toProfile(updated);
    } catch (error) {
      if (isUniqueConstraintError(error)) {
        throw ValidationError.forField('email', DUPLICATE_EMAIL);
      }
      throw error;
    }
  }

  /** Verifies the current password, stores the new one and rotates the token. */
  async changePassword(userId: number, input: ChangePasswordInput): Promise<IssuedToken> {
    const user = this.requireUser(userId);
    const matches = await bcrypt.compare(input.old_password, user.password_hash);
    if (!matches) {
      throw ValidationError.forField('old_password', 'Your old password was entered incorrectly.');
    }

    const passwordHash = await bcrypt.hash(input.new_password, this.bcryptRounds);
    const token = runInTransaction(this.db, () => {
      this.users.update(userId, { password_hash: passwordHash });
      this.tokens.deleteForUser(userId);
      return this.tokens.create(userId);
    });

    info('Password changed', { userId });
    return { token: token.key };
  }

  /** Resolve a token key to its active user, or null. */
  authenticate(key: string): AuthUser | null {
    const token = this.tokens.findByKey(key);
    if (!token) {
      return null;
    }
    const user = this.users.findById(token.user_id);
    if (!user || !user.is_active) {
      return null;
    }
    const { password_hash: _passwordHash, ...authUser } = user;
    return authUser;
  }

  private requireUser(userId: number): User {
    const user = this.users.findById(userId);
    if (!user) {
      throw new NotFoundError('User', userId);
    }
    return user;
  }
}
