import type { JsonObject } from "../../core/index.js";
import { LocalValidationError } from "../errors.js";
import { databaseSchema, parseModel } from "../models/index.js";
import type { Database, ListResponse, Page } from "../models/index.js";
import { fetchListPage, paginate } from "../pagination.js";
import type { CursorPaginator } from "../pagination.js";
import { BaseEndpoint, compact } from "./base.js";
import { parsePage } from "./pages.js";

export interface CreateDatabaseParams {
  parent: JsonObject;
  title: JsonObject[];
  properties: JsonObject;
  description?: JsonObject[];
  icon?: JsonObject | null;
  cover?: JsonObject | null;
  isInline?: boolean;
}

export interface UpdateDatabaseParams {
  title?: JsonObject[];
  description?: JsonObject[];
  /** Property name to config; `null` removes the property. */
  properties?: JsonObject;
  icon?: JsonObject | null;
  cover?: JsonObject | null;
  archived?: boolean;
  in_trash?: boolean;
}

export interface DatabaseQueryParams {
  filter?: JsonObject;
  sorts?: JsonObject[];
  pageSize?: number;
}

export function parseDatabase(raw: JsonObject): Database {
  return parseModel(databaseSchema, raw, "database");
}

export class DatabasesEndpoint extends BaseEndpoint {
  async create(params: CreateDatabaseParams): Promise<Database> {
    const body = compact({
      parent: params.parent,
      title: params.title,
      properties: params.properties,
      is_inline: params.isInline ?? false,
      description: params.description,
      icon: params.icon,
      cover: params.cover,
    });
    this.logger.info("Creating database", { parent: params.parent });
    return parseDatabase(await this.transport.post("databases", body, { retry: false }));
  }

  async retrieve(databaseId: string): Promise<Database> {
    this.validateId(databaseId, "database");
    this.logger.debug(`Retrieving database ${databaseId}`);
    return parseDatabase(await this.transport.get(`databases/${databaseId}`));
  }

  async update(databaseId: string, params: UpdateDatabaseParams): Promise<Database> {
    this.validateId(databaseId, "database");
    const body = compact({
      title: params.title,
      description: params.description,
      properties: params.properties,
      icon: params.icon,
      cover: params.cover,
      archived: params.archived,
      in_trash: params.in_trash,
    });
    if (Object.keys(body).length === 0) {
      throw new LocalValidationError("At least one field must be provided for update");
    }
    this.logger.info(`Updating database ${databaseId}`);
    return parseDatabase(await this.transport.patch(`databases/${databaseId}`, body));
  }

  /** One raw page of query results. */
  query(
    databaseId: string,
    params: DatabaseQueryParams & { startCursor?: string } = {},
  ): Promise<ListResponse<JsonObject>> {
    this.validateId(databaseId, "database");
    return fetchListPage(
      this.transport,
      {
        path: `databases/${databaseId}/query`,
        method: "POST",
        body: compact({ filter: params.filter, sorts: params.sorts }),
        pageSize: params.pageSize,
      },
      params.startCursor,
    );
  }

  iteratePages(databaseId: string, params: DatabaseQueryParams = {}): CursorPaginator<Page> {
    this.validateId(databaseId, "database");
    return paginate(
      this.transport,
      {
        path: `databases/${databaseId}/query`,
        method: "POST",
        body: compact({ filter: params.filter, sorts: params.sorts }),
        pageSize: params.pageSize,
      },
      parsePage,
    );
  }

  queryAll(databaseId: string, params: DatabaseQueryParams = {}): Promise<Page[]> {
    return this.iteratePages(databaseId, params).collect();
  }

  archive(databaseId: string): Promise<Database> {
    return this.update(databaseId, { archived: true });
  }

  unarchive(databaseId: string): Promise<Database> {
    return this.update(databaseId, { archived: false });
  }

  delete(databaseId: string): Promise<Database> {
    return this.update(databaseId, { in_trash: true });
  }

  restore(databaseId: string): Promise<Database> {
    return this.update(databaseId, { in_trash: false });
  }

  // ─── Schema helpers ───

  addProperty(databaseId: string, name: string, config: JsonObject): Promise<Database> {
    return this.update(databaseId, { properties: { [name]: config } });
  }

  removeProperty(databaseId: string, name: string): Promise<Database> {
    return this.update(databaseId, { properties: { [name]: null } });
  }

  renameProperty(databaseId: string, name: string, newName: string): Promise<Database> {
    return this.update(databaseId, { properties: { [name]: { name: newName } } });
  }
}
