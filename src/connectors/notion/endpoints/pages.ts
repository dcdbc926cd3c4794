import type { JsonObject } from "../../core/index.js";
import { LocalValidationError } from "../errors.js";
import { validatePageSize } from "../ids.js";
import { pageSchema, parseModel, propertyItemSchema, rawListSchema } from "../models/index.js";
import type { Page, PropertyItem } from "../models/index.js";
import { BaseEndpoint, compact } from "./base.js";

export interface CreatePageParams {
  parent: JsonObject;
  properties?: JsonObject;
  children?: JsonObject[];
  icon?: JsonObject | null;
  cover?: JsonObject | null;
}

export interface UpdatePageParams {
  properties?: JsonObject;
  archived?: boolean;
  in_trash?: boolean;
  icon?: JsonObject | null;
  cover?: JsonObject | null;
}

/** Reusable page skeleton for `createFromTemplate`. */
export interface PageTemplate {
  properties?: JsonObject;
  children?: JsonObject[];
  icon?: JsonObject | null;
  cover?: JsonObject | null;
}

export function parsePage(raw: JsonObject): Page {
  return parseModel(pageSchema, raw, "page");
}

export class PagesEndpoint extends BaseEndpoint {
  /**
   * Create a page. Never retried, so a transient failure cannot leave a
   * duplicate behind.
   */
  async create(params: CreatePageParams): Promise<Page> {
    const body = compact({
      parent: params.parent,
      properties: params.properties ?? {},
      children: params.children,
      icon: params.icon,
      cover: params.cover,
    });
    this.logger.info("Creating page", { parent: params.parent });
    return parsePage(await this.transport.post("pages", body, { retry: false }));
  }

  async retrieve(pageId: string): Promise<Page> {
    this.validateId(pageId, "page");
    this.logger.debug(`Retrieving page ${pageId}`);
    return parsePage(await this.transport.get(`pages/${pageId}`));
  }

  async update(pageId: string, params: UpdatePageParams): Promise<Page> {
    this.validateId(pageId, "page");
    const body = compact({
      properties: params.properties,
      archived: params.archived,
      in_trash: params.in_trash,
      icon: params.icon,
      cover: params.cover,
    });
    if (Object.keys(body).length === 0) {
      throw new LocalValidationError("At least one field must be provided for update");
    }
    this.logger.info(`Updating page ${pageId}`);
    return parsePage(await this.transport.patch(`pages/${pageId}`, body));
  }

  archive(pageId: string): Promise<Page> {
    return this.update(pageId, { archived: true });
  }

  unarchive(pageId: string): Promise<Page> {
    return this.update(pageId, { archived: false });
  }

  /** Move to trash. */
  delete(pageId: string): Promise<Page> {
    return this.update(pageId, { in_trash: true });
  }

  restore(pageId: string): Promise<Page> {
    return this.update(pageId, { in_trash: false });
  }

  async retrieveProperty(
    pageId: string,
    propertyId: string,
    opts: { startCursor?: string; pageSize?: number } = {},
  ): Promise<PropertyItem> {
    this.validateId(pageId, "page");
    if (opts.pageSize !== undefined) validatePageSize(opts.pageSize);
    const raw = await this.transport.get(`pages/${pageId}/properties/${propertyId}`, {
      start_cursor: opts.startCursor,
      page_size: opts.pageSize,
    });
    return parseModel(propertyItemSchema, raw, "property item");
  }

  /**
   * Every item of a property. Paginated properties (long relations, rich
   * text, people) are followed to the end; any other property comes back as
   * its single item.
   */
  async getPropertyAllItems(
    pageId: string,
    propertyId: string,
    pageSize = 100,
  ): Promise<JsonObject[]> {
    this.validateId(pageId, "page");
    validatePageSize(pageSize);
    const path = `pages/${pageId}/properties/${propertyId}`;

    const items: JsonObject[] = [];
    let cursor: string | undefined;
    do {
      const raw = await this.transport.get(path, { page_size: pageSize, start_cursor: cursor });
      if (cursor === undefined && raw.object === "property_item") {
        return [raw];
      }
      const page = parseModel(rawListSchema, raw, `list ${path}`);
      items.push(...page.results);
      cursor = page.has_more && page.next_cursor ? page.next_cursor : undefined;
    } while (cursor !== undefined);
    return items;
  }

  createFromTemplate(
    parent: JsonObject,
    template: PageTemplate,
    overrides: JsonObject = {},
  ): Promise<Page> {
    return this.create({
      parent,
      properties: { ...template.properties, ...overrides },
      children: template.children ?? [],
      icon: template.icon,
      cover: template.cover,
    });
  }
}
