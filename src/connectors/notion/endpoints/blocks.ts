import type { JsonObject } from "../../core/index.js";
import { LocalValidationError } from "../errors.js";
import { normalizeId } from "../ids.js";
import { blockSchema, parseModel, rawListSchema } from "../models/index.js";
import type { Block, ListResponse } from "../models/index.js";
import { fetchListPage, paginate } from "../pagination.js";
import type { CursorPaginator } from "../pagination.js";
import { BaseEndpoint, compact } from "./base.js";

export const DEFAULT_TREE_DEPTH = 10;
const MAX_CHILDREN_PER_APPEND = 100;

export interface BlockTreeNode {
  block: Block;
  children: BlockTreeNode[];
}

export function parseBlock(raw: JsonObject): Block {
  return parseModel(blockSchema, raw, "block");
}

export class BlocksEndpoint extends BaseEndpoint {
  async retrieve(blockId: string): Promise<Block> {
    this.validateId(blockId, "block");
    this.logger.debug(`Retrieving block ${blockId}`);
    return parseBlock(await this.transport.get(`blocks/${blockId}`));
  }

  /**
   * Patch a block with type-specific data, e.g. `{ paragraph: { rich_text } }`.
   */
  async update(blockId: string, data: JsonObject): Promise<Block> {
    this.validateId(blockId, "block");
    if (Object.keys(data).length === 0) {
      throw new LocalValidationError("Block update data must be provided");
    }
    this.logger.info(`Updating block ${blockId}`);
    return parseBlock(await this.transport.patch(`blocks/${blockId}`, data));
  }

  /** HTTP DELETE; Notion archives the block. */
  async delete(blockId: string): Promise<Block> {
    this.validateId(blockId, "block");
    this.logger.info(`Deleting block ${blockId}`);
    return parseBlock(await this.transport.delete(`blocks/${blockId}`));
  }

  archive(blockId: string): Promise<Block> {
    return this.update(blockId, { archived: true });
  }

  unarchive(blockId: string): Promise<Block> {
    return this.update(blockId, { archived: false });
  }

  trash(blockId: string): Promise<Block> {
    return this.update(blockId, { in_trash: true });
  }

  restore(blockId: string): Promise<Block> {
    return this.update(blockId, { in_trash: false });
  }

  // ─── Children ───

  getChildren(
    blockId: string,
    opts: { startCursor?: string; pageSize?: number } = {},
  ): Promise<ListResponse<JsonObject>> {
    this.validateId(blockId, "block");
    return fetchListPage(
      this.transport,
      { path: `blocks/${blockId}/children`, pageSize: opts.pageSize },
      opts.startCursor,
    );
  }

  iterateChildren(blockId: string, pageSize?: number): CursorPaginator<Block> {
    this.validateId(blockId, "block");
    return paginate(this.transport, { path: `blocks/${blockId}/children`, pageSize }, parseBlock);
  }

  getAllChildren(blockId: string, pageSize?: number): Promise<Block[]> {
    return this.iterateChildren(blockId, pageSize).collect();
  }

  /**
   * Append up to 100 blocks. Not retried, so a transient failure cannot
   * append the same children twice.
   */
  async appendChildren(
    blockId: string,
    children: JsonObject[],
    after?: string,
  ): Promise<ListResponse<JsonObject>> {
    this.validateId(blockId, "block");
    if (children.length === 0) {
      throw new LocalValidationError("Children list cannot be empty");
    }
    if (children.length > MAX_CHILDREN_PER_APPEND) {
      throw new LocalValidationError(
        `Cannot append more than ${MAX_CHILDREN_PER_APPEND} children in one request, got ${children.length}`,
      );
    }
    if (after !== undefined) this.validateId(after, "block");

    this.logger.info(`Appending ${children.length} children to block ${blockId}`);
    const raw = await this.transport.patch(
      `blocks/${blockId}/children`,
      compact({ children, after }),
      { retry: false },
    );
    return parseModel(rawListSchema, raw, "appended children");
  }

  async createChildBlocks(parentId: string, blocks: JsonObject[]): Promise<Block[]> {
    const response = await this.appendChildren(parentId, blocks);
    return response.results.map(parseBlock);
  }

  // ─── Tree ───

  /**
   * Fetch a block and its descendants. Recursion stops at `maxDepth` levels
   * below the root and at any block already visited.
   */
  async getBlockTree(rootId: string, maxDepth = DEFAULT_TREE_DEPTH): Promise<BlockTreeNode> {
    const root = await this.retrieve(rootId);
    const visited = new Set<string>([normalizeId(root.id)]);
    const children = root.has_children ? await this.subtree(root.id, 0, maxDepth, visited) : [];
    return { block: root, children };
  }

  private async subtree(
    parentId: string,
    depth: number,
    maxDepth: number,
    visited: Set<string>,
  ): Promise<BlockTreeNode[]> {
    if (depth >= maxDepth) return [];

    const nodes: BlockTreeNode[] = [];
    for (const block of await this.getAllChildren(parentId)) {
      const key = normalizeId(block.id);
      if (visited.has(key)) {
        this.logger.warn(`Skipping block ${block.id}: already visited in this tree`);
        continue;
      }
      visited.add(key);
      const children = block.has_children
        ? await this.subtree(block.id, depth + 1, maxDepth, visited)
        : [];
      nodes.push({ block, children });
    }
    return nodes;
  }
}
