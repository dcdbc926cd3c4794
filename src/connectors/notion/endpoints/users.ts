import type { JsonObject } from "../../core/index.js";
import { parseModel, userSchema } from "../models/index.js";
import type { ListResponse, User } from "../models/index.js";
import { fetchListPage, paginate } from "../pagination.js";
import { BaseEndpoint } from "./base.js";

export function parseUser(raw: JsonObject): User {
  return parseModel(userSchema, raw, "user");
}

export class UsersEndpoint extends BaseEndpoint {
  list(opts: { startCursor?: string; pageSize?: number } = {}): Promise<ListResponse<JsonObject>> {
    return fetchListPage(this.transport, { path: "users", pageSize: opts.pageSize }, opts.startCursor);
  }

  listAll(pageSize?: number): Promise<User[]> {
    return paginate(this.transport, { path: "users", pageSize }, parseUser).collect();
  }

  async retrieve(userId: string): Promise<User> {
    this.validateId(userId, "user");
    return parseUser(await this.transport.get(`users/${userId}`));
  }

  /** The bot user behind the current credentials. */
  async me(): Promise<User> {
    return parseUser(await this.transport.get("users/me"));
  }

  async findByEmail(email: string): Promise<User | undefined> {
    const wanted = email.toLowerCase();
    const users = await this.listAll();
    return users.find(
      (user) => user.type === "person" && user.person?.email?.toLowerCase() === wanted,
    );
  }

  async findByName(name: string, exactMatch = false): Promise<User[]> {
    const wanted = name.toLowerCase();
    const users = await this.listAll();
    return users.filter((user) => {
      if (!user.name) return false;
      return exactMatch ? user.name === name : user.name.toLowerCase().includes(wanted);
    });
  }

  /** People only, no bots. */
  async getWorkspaceMembers(): Promise<User[]> {
    const users = await this.listAll();
    return users.filter((user) => user.type === "person");
  }

  async getBots(): Promise<User[]> {
    const users = await this.listAll();
    return users.filter((user) => user.type === "bot");
  }
}
