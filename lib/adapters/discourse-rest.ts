// Discourse REST helpers (axios-based). All URLs derive from DiscourseCfg.baseUrl.
// Errors are formatted via explainAxios(); 404s surface as DocumentNotFoundError.

import axios, { type AxiosInstance } from "axios";
import { z } from "zod";
import { DocumentNotFoundError } from "../domain/errors.ts";
import type { DiscourseCfg } from "../utils/types.ts";
import { explainAxios, statusOf } from "./http-errors.ts";

export function authHeaders(cfg: DiscourseCfg): Record<string, string> {
  return {
    "Api-Key": cfg.apiKey,
    "Api-Username": cfg.apiUsername,
  };
}

/** Create a preconfigured axios client for this Discourse instance. */
export function makeClient(cfg: DiscourseCfg, ax?: AxiosInstance): AxiosInstance {
  if (ax) return ax;
  return axios.create({
    baseURL: cfg.baseUrl,
    headers: {
      ...authHeaders(cfg),
      "Accept": "application/json",
    },
    // Topics move when their slug changes; follow the server's redirects.
    maxRedirects: 5,
  });
}

const TopicSchema = z.object({
  id: z.number(),
  slug: z.string().optional(),
  details: z.object({ can_edit: z.boolean().optional() }).optional(),
  post_stream: z.object({
    posts: z.array(z.object({ id: z.number() })).min(1),
  }),
});

export interface TopicInfo {
  topicId: number;
  firstPostId: number;
  canEdit: boolean;
}

const CreatedPostSchema = z.object({
  id: z.number(),
  topic_id: z.number(),
  topic_slug: z.string(),
});

/** JSON endpoint for a topic address: "/t/slug/12" -> "/t/slug/12.json". */
export function topicJsonPath(url: string, baseUrl: string): string {
  const { pathname } = new URL(url, baseUrl);
  return `${pathname.replace(/\/+$/, "").replace(/\.json$/, "")}.json`;
}

export function topicUrl(baseUrl: string, slug: string, topicId: number): string {
  return `${baseUrl.replace(/\/+$/, "")}/t/${slug}/${topicId}`;
}

export async function getTopic(cfg: DiscourseCfg, url: string, ax: AxiosInstance): Promise<TopicInfo> {
  try {
    const res = await ax.get<unknown>(topicJsonPath(url, cfg.baseUrl));
    const topic = TopicSchema.parse(res.data);
    return {
      topicId: topic.id,
      firstPostId: topic.post_stream.posts[0].id,
      canEdit: topic.details?.can_edit === true,
    };
  } catch (err) {
    if (statusOf(err) === 404) throw new DocumentNotFoundError(url, { cause: err });
    throw explainAxios(err, `Failed to read topic ${url}`);
  }
}

/** Raw markdown of the first post. */
export async function getRaw(topicId: number, ax: AxiosInstance): Promise<string> {
  try {
    const res = await ax.get<string>(`/raw/${topicId}`, { responseType: "text" });
    return typeof res.data === "string" ? res.data : String(res.data);
  } catch (err) {
    if (statusOf(err) === 404) throw new DocumentNotFoundError(`/raw/${topicId}`, { cause: err });
    throw explainAxios(err, `Failed to read raw content of topic ${topicId}`);
  }
}

export async function createTopic(
  post: { title: string; raw: string; categoryId: number },
  ax: AxiosInstance,
): Promise<{ topicId: number; slug: string }> {
  try {
    const res = await ax.post<unknown>("/posts.json", {
      title: post.title,
      raw: post.raw,
      category: post.categoryId,
    });
    const created = CreatedPostSchema.parse(res.data);
    return { topicId: created.topic_id, slug: created.topic_slug };
  } catch (err) {
    throw explainAxios(err, `Failed to create topic "${post.title}"`);
  }
}

/** Hide the topic from listings; it stays reachable by URL. */
export async function unlistTopic(topicId: number, ax: AxiosInstance): Promise<void> {
  try {
    await ax.put(`/t/${topicId}/status.json`, { status: "visible", enabled: "false" });
  } catch (err) {
    throw explainAxios(err, `Failed to unlist topic ${topicId}`);
  }
}

export async function updatePost(postId: number, raw: string, ax: AxiosInstance): Promise<void> {
  try {
    await ax.put(`/posts/${postId}.json`, { post: { raw } });
  } catch (err) {
    throw explainAxios(err, `Failed to update post ${postId}`);
  }
}

export async function deleteTopic(topicId: number, ax: AxiosInstance): Promise<void> {
  try {
    await ax.delete(`/t/${topicId}.json`);
  } catch (err) {
    if (statusOf(err) === 404) throw new DocumentNotFoundError(`/t/${topicId}`, { cause: err });
    throw explainAxios(err, `Failed to delete topic ${topicId}`);
  }
}
