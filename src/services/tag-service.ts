import { v4 as uuidv4 } from "uuid";
import { ConflictError } from "../errors";
import type { TagCreateInput, TagListQuery, TagUpdateInput } from "../schemas";
import type { DataStore, Repositories, TagPatch } from "../store/types";
import type { Tag, TagView } from "../types";
import { assertOwned } from "./ownership";
import { toTagView } from "./views";

export interface TagPage {
  tags: TagView[];
  total: number;
  page: number;
  perPage: number;
  totalPages: number;
}

export class TagService {
  private readonly clock: () => Date;

  constructor(
    private readonly store: DataStore,
    clock?: () => Date
  ) {
    this.clock = clock ?? (() => new Date());
  }

  private async assertNameFree(repos: Repositories, ownerId: string, name: string, exceptId?: string) {
    const existing = await repos.tags.findByName(ownerId, name);
    if (existing && existing.id !== exceptId) {
      throw new ConflictError(`Tag "${name}" already exists`);
    }
  }

  listTags(ownerId: string, query: TagListQuery): Promise<TagPage> {
    return this.store.read(async (repos) => {
      const tags = await repos.tags.list(ownerId, query.search, query);
      const total = await repos.tags.count(ownerId, query.search);
      return {
        tags: tags.map((tag) => toTagView(tag)),
        total,
        page: Math.floor(query.skip / query.limit) + 1,
        perPage: query.limit,
        totalPages: Math.ceil(total / query.limit),
      };
    });
  }

  getTag(ownerId: string, tagId: string): Promise<TagView> {
    return this.store.read(async (repos) => {
      const tag = assertOwned(await repos.tags.findById(tagId), ownerId, "tag");
      return toTagView(tag, await repos.taskTags.countByTag(tag.id));
    });
  }

  createTag(ownerId: string, input: TagCreateInput): Promise<TagView> {
    return this.store.withTransaction(async (repos) => {
      await this.assertNameFree(repos, ownerId, input.name);

      const now = this.clock();
      const tag: Tag = {
        id: uuidv4(),
        ownerId,
        name: input.name,
        color: input.color,
        description: input.description ?? null,
        createdAt: now,
        updatedAt: now,
      };
      await repos.tags.insert(tag);
      return toTagView(tag, 0);
    });
  }

  updateTag(ownerId: string, tagId: string, input: TagUpdateInput): Promise<TagView> {
    return this.store.withTransaction(async (repos) => {
      const tag = assertOwned(await repos.tags.findById(tagId), ownerId, "tag");

      const patch: TagPatch = {};
      if (input.name !== undefined && input.name !== tag.name) {
        await this.assertNameFree(repos, ownerId, input.name, tag.id);
        patch.name = input.name;
      }
      if (input.color !== undefined) patch.color = input.color;
      if (input.description !== undefined) patch.description = input.description;

      if (Object.keys(patch).length > 0) {
        await repos.tags.update(tag.id, { ...patch, updatedAt: this.clock() });
      }

      const updated = assertOwned(await repos.tags.findById(tag.id), ownerId, "tag");
      return toTagView(updated, await repos.taskTags.countByTag(tag.id));
    });
  }

  /** Removes the tag and every association that references it. */
  async deleteTag(ownerId: string, tagId: string): Promise<void> {
    await this.store.withTransaction(async (repos) => {
      const tag = assertOwned(await repos.tags.findById(tagId), ownerId, "tag");
      await repos.taskTags.deleteByTag(tag.id);
      await repos.tags.delete(tag.id);
    });
  }
}
