// IDocumentServer adapter for Discourse: one topic per document, content in
// the topic's first post.

import type { AxiosInstance } from "axios";
import { DocumentNotFoundError } from "../domain/errors.ts";
import type { IDocumentServer } from "../ports/ports.ts";
import { asRemoteUrl, type DiscourseCfg, type RemoteUrl } from "../utils/types.ts";
import {
  createTopic,
  deleteTopic,
  getRaw,
  getTopic,
  makeClient,
  topicUrl,
  unlistTopic,
  updatePost,
} from "./discourse-rest.ts";

export class DiscourseDocumentServer implements IDocumentServer {
  private readonly cfg: DiscourseCfg;
  private readonly ax: AxiosInstance;

  constructor(cfg: DiscourseCfg, ax?: AxiosInstance) {
    this.cfg = cfg;
    this.ax = makeClient(cfg, ax);
  }

  async get(url: RemoteUrl): Promise<string> {
    const topic = await getTopic(this.cfg, url, this.ax);
    return await getRaw(topic.topicId, this.ax);
  }

  async create(doc: { categoryId: number; title: string; content: string }): Promise<RemoteUrl> {
    const { topicId, slug } = await createTopic(
      { title: doc.title, raw: doc.content, categoryId: doc.categoryId },
      this.ax,
    );
    await unlistTopic(topicId, this.ax);
    return asRemoteUrl(topicUrl(this.cfg.baseUrl, slug, topicId));
  }

  async update(url: RemoteUrl, content: string): Promise<void> {
    const topic = await getTopic(this.cfg, url, this.ax);
    await updatePost(topic.firstPostId, content, this.ax);
  }

  async delete(url: RemoteUrl): Promise<void> {
    try {
      const topic = await getTopic(this.cfg, url, this.ax);
      await deleteTopic(topic.topicId, this.ax);
    } catch (err) {
      if (!(err instanceof DocumentNotFoundError)) throw err;
    }
  }

  async canWrite(url: RemoteUrl): Promise<boolean> {
    return (await getTopic(this.cfg, url, this.ax)).canEdit;
  }
}
