// ---------------------------------------------------------------------------
// UserService – user identities with unique usernames
// ---------------------------------------------------------------------------

import type { EntityStore } from "../store/entity-store.js";
import { NotFoundError, ValidationError } from "../store/errors.js";
import { requireId, requireText } from "../store/validate.js";
import { BaseService, type ServiceDeps } from "../tracker/deps.js";
import type { User } from "./types.js";

export class UserService extends BaseService {
  constructor(
    deps: ServiceDeps,
    private readonly users: EntityStore<User>,
  ) {
    super(deps);
  }

  create(username: string, email: string): User {
    requireText(username, "username");
    requireText(email, "email");
    if (this.getByUsername(username)) {
      throw new ValidationError(`username "${username}" already exists`);
    }

    const user: User = { id: this.deps.ids.next(), username, email };
    this.users.save(user);

    this.emit("user.created", user);
    this.deps.log.info(`user created: ${user.id} — ${user.username}`);
    return user;
  }

  get(userId: string): User | undefined {
    return this.users.findById(requireId(userId, "User"));
  }

  /** Exact, case-sensitive match. */
  getByUsername(username: string): User | undefined {
    requireText(username, "username");
    return this.users.findAll().find((u) => u.username === username);
  }

  list(): User[] {
    return this.users.findAll();
  }

  updateUsername(userId: string, username: string): User {
    requireText(username, "username");
    const user = this.require(userId);
    const holder = this.getByUsername(username);
    if (holder && holder.id !== user.id) {
      throw new ValidationError(`username "${username}" is already taken`);
    }
    user.username = username;
    return this.commit(user);
  }

  updateEmail(userId: string, email: string): User {
    requireText(email, "email");
    const user = this.require(userId);
    user.email = email;
    return this.commit(user);
  }

  delete(userId: string): boolean {
    const removed = this.users.deleteById(requireId(userId, "User"));
    if (removed) {
      this.emit("user.deleted", { id: userId });
      this.deps.log.info(`user deleted: ${userId}`);
    }
    return removed;
  }

  private require(userId: string): User {
    const user = this.get(userId);
    if (!user) {
      throw new NotFoundError("User", userId);
    }
    return user;
  }

  private commit(user: User): User {
    this.users.save(user);
    this.emit("user.updated", user);
    return user;
  }
}
