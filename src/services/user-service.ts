import type { ProfileUpdateInput } from "../schemas";
import { UnauthorizedError } from "../errors";
import type { DataStore, UserPatch } from "../store/types";
import type { UserView } from "../types";
import { toUserView } from "./views";

export interface DeletedAccount {
  tasks: number;
  tags: number;
  associations: number;
}

export class UserService {
  private readonly clock: () => Date;

  constructor(
    private readonly store: DataStore,
    clock?: () => Date
  ) {
    this.clock = clock ?? (() => new Date());
  }

  getProfile(userId: string): Promise<UserView> {
    return this.store.read(async (repos) => {
      const user = await repos.users.findById(userId);
      if (!user) {
        throw new UnauthorizedError("User no longer exists");
      }
      return toUserView(user);
    });
  }

  updateProfile(userId: string, input: ProfileUpdateInput): Promise<UserView> {
    return this.store.withTransaction(async (repos) => {
      const user = await repos.users.findById(userId);
      if (!user) {
        throw new UnauthorizedError("User no longer exists");
      }

      const patch: UserPatch = {};
      if (input.displayName !== undefined) patch.displayName = input.displayName;
      if (input.avatarUrl !== undefined) patch.avatarUrl = input.avatarUrl;
      if (Object.keys(patch).length === 0) {
        return toUserView(user);
      }

      const updatedAt = this.clock();
      await repos.users.update(userId, { ...patch, updatedAt });
      return toUserView({ ...user, ...patch, updatedAt });
    });
  }

  /** Deletes the account and everything it owns in one transaction. */
  deleteAccount(userId: string): Promise<DeletedAccount> {
    return this.store.withTransaction(async (repos) => {
      const user = await repos.users.findById(userId);
      if (!user) {
        throw new UnauthorizedError("User no longer exists");
      }

      const associations = await repos.taskTags.deleteByOwner(user.id);
      const tasks = await repos.tasks.deleteByOwner(user.id);
      const tags = await repos.tags.deleteByOwner(user.id);
      await repos.users.delete(user.id);
      return { tasks, tags, associations };
    });
  }
}
