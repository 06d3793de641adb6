/**
 * Resources discovered while executing steps, deduplicated by URL.
 */

import { z } from "zod";

export const ResourceSchema = z.object({
  url: z.string().min(1),
  title: z.string(),
});

export interface Resource {
  readonly url: string;
  readonly title: string;
}

export class ResourceSet {
  private readonly byUrl = new Map<string, Resource>();

  static from(resources: readonly Resource[]): ResourceSet {
    const set = new ResourceSet();
    set.addAll(resources);
    return set;
  }

  /**
   * Add a resource unless its URL is already known (first title wins).
   * Blank URLs are ignored.
   *
   * @returns true when the resource was added
   */
  add(resource: Resource): boolean {
    const url = resource.url.trim();
    if (url === "" || this.byUrl.has(url)) {
      return false;
    }
    this.byUrl.set(url, Object.freeze({ url, title: resource.title.trim() || url }));
    return true;
  }

  /** @returns number of resources actually added */
  addAll(resources: readonly Resource[]): number {
    let added = 0;
    for (const resource of resources) {
      if (this.add(resource)) added++;
    }
    return added;
  }

  get size(): number {
    return this.byUrl.size;
  }

  /** Resources in first-seen order. */
  list(): readonly Resource[] {
    return Object.freeze([...this.byUrl.values()]);
  }
}
