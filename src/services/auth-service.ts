import { v4 as uuidv4 } from "uuid";
import type { PasswordHasher } from "../auth/password";
import type { TokenPair, TokenService } from "../auth/tokens";
import { ConflictError, UnauthorizedError, ValidationError } from "../errors";
import type { ChangePasswordInput, LoginInput, RegisterInput } from "../schemas";
import type { DataStore } from "../store/types";
import type { User, UserView } from "../types";
import { toUserView } from "./views";

const INVALID_CREDENTIALS = "Invalid email or password";

export class AuthService {
  private readonly clock: () => Date;

  constructor(
    private readonly store: DataStore,
    private readonly hasher: PasswordHasher,
    private readonly tokens: TokenService,
    clock?: () => Date
  ) {
    this.clock = clock ?? (() => new Date());
  }

  async register(input: RegisterInput): Promise<UserView> {
    const passwordHash = await this.hasher.hash(input.password);

    return this.store.withTransaction(async (repos) => {
      if (await repos.users.findByEmail(input.email)) {
        throw new ConflictError("Email is already registered");
      }

      const now = this.clock();
      const user: User = {
        id: uuidv4(),
        email: input.email,
        passwordHash,
        displayName: input.displayName,
        avatarUrl: null,
        isActive: true,
        lastLoginAt: null,
        createdAt: now,
        updatedAt: now,
      };
      await repos.users.insert(user);
      return toUserView(user);
    });
  }

  async login(input: LoginInput): Promise<TokenPair> {
    const user = await this.store.read((repos) => repos.users.findByEmail(input.email));
    if (!user || !(await this.hasher.verify(user.passwordHash, input.password))) {
      throw new UnauthorizedError(INVALID_CREDENTIALS);
    }
    if (!user.isActive) {
      throw new UnauthorizedError("Account is disabled");
    }

    await this.store.withTransaction((repos) => repos.users.update(user.id, { lastLoginAt: this.clock() }));
    return this.tokens.issuePair({ userId: user.id, email: user.email });
  }

  async refresh(refreshToken: string): Promise<TokenPair> {
    const subject = this.tokens.verify(refreshToken, "refresh");
    const user = await this.store.read((repos) => repos.users.findById(subject.userId));
    if (!user || !user.isActive) {
      throw new UnauthorizedError("Invalid or expired token");
    }
    return this.tokens.issuePair({ userId: user.id, email: user.email });
  }

  async changePassword(userId: string, input: ChangePasswordInput): Promise<void> {
    const user = await this.store.read((repos) => repos.users.findById(userId));
    if (!user) {
      throw new UnauthorizedError("User no longer exists");
    }
    if (!(await this.hasher.verify(user.passwordHash, input.currentPassword))) {
      throw new ValidationError("Current password is incorrect");
    }
    if (input.currentPassword === input.newPassword) {
      throw new ValidationError("New password must differ from the current one");
    }

    const passwordHash = await this.hasher.hash(input.newPassword);
    await this.store.withTransaction((repos) =>
      repos.users.update(user.id, { passwordHash, updatedAt: this.clock() })
    );
  }
}
