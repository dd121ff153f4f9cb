import { z } from "zod";
import type { Document, SourceType } from "../domain/types.js";
import { isBlank, normalizeTags, normalizeText } from "../utils/text.js";

export interface NestedRecord {
  sourceType: SourceType;
  raw: unknown;
}

export type ExtractResult =
  | { ok: true; document: Document }
  | { ok: false; issues: string[] };

export interface SourceExtractor {
  readonly sourceType: SourceType;
  extract(raw: unknown): ExtractResult;
  children(raw: unknown): NestedRecord[];
}

const recordId = z.union([z.string().trim().min(1), z.number()]).transform(String);
const optionalText = z.string().nullish();
const optionalNumber = z.number().nullish();
const tagList = z.array(z.string()).nullish();

const promptSectionSchema = z.object({
  type: optionalText,
  title: optionalText,
  content: optionalText,
});

// Scrapers emit prompts found in a post either as bare strings or as sections.
const extractedPromptSchema = z.union([
  z.string().transform((content) => ({ type: null, title: null, content })),
  promptSectionSchema,
]);

const forumPostSchema = z.object({
  id: recordId,
  title: optionalText,
  body: optionalText,
  subreddit: optionalText,
  flair: optionalText,
  permalink: optionalText,
  url: optionalText,
  author: optionalText,
  score: optionalNumber,
  created_date: optionalText,
  created_utc: optionalNumber,
  tags: tagList,
  top_comments: z.array(z.unknown()).nullish(),
  extracted_prompts: z.array(extractedPromptSchema).nullish(),
});

const forumCommentSchema = z.object({
  id: recordId,
  body: optionalText,
  subreddit: optionalText,
  permalink: optionalText,
  author: optionalText,
  score: optionalNumber,
  created_date: optionalText,
  created_utc: optionalNumber,
  tags: tagList,
});

const repoReadmeSchema = z.object({
  repo: z.string().trim().min(1),
  url: optionalText,
  stars: optionalNumber,
  topics: tagList,
  language: optionalText,
  last_updated: optionalText,
  readme_content: optionalText,
  extracted_prompts: z.array(promptSectionSchema).nullish(),
  prompt_files: z.array(z.unknown()).nullish(),
});

const repoFileSchema = z.object({
  repo: z.string().trim().min(1),
  path: z.string().trim().min(1),
  content: optionalText,
  url: optionalText,
  stars: optionalNumber,
  topics: tagList,
  last_updated: optionalText,
});

function defineExtractor<S extends z.ZodTypeAny>(
  sourceType: SourceType,
  schema: S,
  build: (record: z.output<S>) => Document | string[],
  nested: (record: z.output<S>) => NestedRecord[] = () => [],
): SourceExtractor {
  return {
    sourceType,
    extract(raw) {
      const parsed = schema.safeParse(raw);
      if (!parsed.success) {
        return { ok: false, issues: formatIssues(parsed.error) };
      }
      const built = build(parsed.data);
      return Array.isArray(built) ? { ok: false, issues: built } : { ok: true, document: built };
    },
    children(raw) {
      const parsed = schema.safeParse(raw);
      return parsed.success ? nested(parsed.data) : [];
    },
  };
}

const forumPostExtractor = defineExtractor(
  "forum_post",
  forumPostSchema,
  (post) => {
    const rawText = joinParts([post.title, post.body]);
    if (!rawText) {
      return ["title/body: a forum post needs a title or a body"];
    }
    const community = post.subreddit?.trim() || "unknown";
    return {
      sourceId: `forum_post:${post.id}`,
      sourceType: "forum_post",
      rawText,
      sourceUrl: firstNonBlank(post.permalink, post.url) ?? `forum://${community}/${post.id}`,
      author: firstNonBlank(post.author) ?? "unknown",
      score: post.score ?? 0,
      createdAt: toIsoDate(post.created_date, post.created_utc),
      explicitTags: normalizeTags([post.subreddit, post.flair, ...(post.tags ?? [])]),
    };
  },
  (post) => [
    ...(post.extracted_prompts ?? []).flatMap((prompt, index): NestedRecord[] =>
      isBlank(prompt.content)
        ? []
        : [
            {
              sourceType: "forum_post",
              raw: {
                id: `${post.id}/prompt-${index}`,
                title: prompt.title,
                body: prompt.content,
                subreddit: post.subreddit,
                permalink: post.permalink,
                url: post.url,
                author: post.author,
                score: post.score,
                created_date: post.created_date,
                created_utc: post.created_utc,
                tags: normalizeTags(["extracted-prompt", prompt.type]),
              },
            },
          ],
    ),
    ...(post.top_comments ?? []).map((comment): NestedRecord => ({
      sourceType: "forum_comment",
      raw: isPlainObject(comment)
        ? { subreddit: post.subreddit, permalink: post.permalink, ...comment }
        : comment,
    })),
  ],
);

const forumCommentExtractor = defineExtractor("forum_comment", forumCommentSchema, (comment) => {
  if (isBlank(comment.body)) {
    return ["body: a forum comment needs a non-empty body"];
  }
  const community = comment.subreddit?.trim() || "unknown";
  return {
    sourceId: `forum_comment:${comment.id}`,
    sourceType: "forum_comment",
    rawText: normalizeText(comment.body ?? ""),
    sourceUrl: firstNonBlank(comment.permalink) ?? `forum://${community}/comments/${comment.id}`,
    author: firstNonBlank(comment.author) ?? "unknown",
    score: comment.score ?? 0,
    createdAt: toIsoDate(comment.created_date, comment.created_utc),
    explicitTags: normalizeTags([comment.subreddit, "comment", ...(comment.tags ?? [])]),
  };
});

const repoReadmeExtractor = defineExtractor(
  "repo_readme",
  repoReadmeSchema,
  (repo) => {
    const promptSections = (repo.extracted_prompts ?? []).filter(
      (section) => !isBlank(section.content),
    );
    const sections = promptSections.map((section) => joinParts([section.title, section.content]));
    const rawText = joinParts([repo.readme_content, ...sections]);
    if (!rawText) {
      return ["readme_content: a repository record needs README content or a prompt section"];
    }
    return {
      sourceId: `repo_readme:${repo.repo}`,
      sourceType: "repo_readme",
      rawText,
      sourceUrl: firstNonBlank(repo.url) ?? `repo://${repo.repo}`,
      author: repoOwner(repo.repo),
      score: repo.stars ?? 0,
      createdAt: toIsoDate(repo.last_updated, null),
      explicitTags: normalizeTags([
        ...(repo.topics ?? []),
        repo.language,
        "readme",
        sections.length > 0 ? "extracted-prompt" : null,
        ...promptSections.map((section) => section.type),
      ]),
    };
  },
  (repo) =>
    (repo.prompt_files ?? []).map((file): NestedRecord => ({
      sourceType: "repo_file",
      raw: isPlainObject(file)
        ? {
            repo: repo.repo,
            url: repo.url,
            stars: repo.stars,
            topics: repo.topics,
            last_updated: repo.last_updated,
            ...file,
          }
        : file,
    })),
);

const repoFileExtractor = defineExtractor("repo_file", repoFileSchema, (file) => {
  if (isBlank(file.content)) {
    return ["content: a repository file needs non-empty content"];
  }
  return {
    sourceId: `repo_file:${file.repo}/${file.path}`,
    sourceType: "repo_file",
    rawText: normalizeText(file.content ?? ""),
    sourceUrl: firstNonBlank(file.url) ?? `repo://${file.repo}/${file.path}`,
    author: repoOwner(file.repo),
    score: file.stars ?? 0,
    createdAt: toIsoDate(file.last_updated, null),
    explicitTags: normalizeTags([...(file.topics ?? []), "prompt-file"]),
  };
});

export const EXTRACTORS: Readonly<Record<SourceType, SourceExtractor>> = {
  forum_post: forumPostExtractor,
  forum_comment: forumCommentExtractor,
  repo_readme: repoReadmeExtractor,
  repo_file: repoFileExtractor,
};

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const location = issue.path.length > 0 ? issue.path.join(".") : "record";
    return `${location}: ${issue.message}`;
  });
}

function joinParts(parts: Array<string | null | undefined>): string {
  return parts
    .map((part) => normalizeText(part ?? ""))
    .filter((part) => part.length > 0)
    .join("\n\n");
}

function firstNonBlank(...values: Array<string | null | undefined>): string | null {
  for (const value of values) {
    const trimmed = value?.trim();
    if (trimmed) {
      return trimmed;
    }
  }
  return null;
}

function repoOwner(repo: string): string {
  const [owner] = repo.split("/");
  return owner?.trim() || "unknown";
}

function toIsoDate(text: string | null | undefined, epochSeconds: number | null | undefined): string | null {
  if (text) {
    const parsed = Date.parse(text);
    if (!Number.isNaN(parsed)) {
      return new Date(parsed).toISOString();
    }
  }
  if (typeof epochSeconds === "number" && epochSeconds > 0) {
    return new Date(epochSeconds * 1000).toISOString();
  }
  return null;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
