import { randomUUID } from "crypto";
import { match } from "ts-pattern";

export const POST_TYPES = [
  "article",
  "image",
  "video",
  "youtube",
  "pdf"
] as const;
export type PostType = (typeof POST_TYPES)[number];

export type MediaType = "none" | "image" | "youtube" | "pdf";

export interface Post {
  readonly id: string;
  readonly title: string;
  readonly author: string;
  readonly date: string;
  readonly type: PostType;
  readonly banner: string;
  readonly content: string;
  readonly mediaType: MediaType;
  readonly mediaUrl: string;
}

export interface PostInput {
  readonly title: string;
  readonly author: string;
  readonly content: string;
  readonly type: PostType;
  /** Link submitted with the form, used by video and pdf posts. */
  readonly mediaUrl: string;
  readonly banner: string;
}

export function toPostType(value: string | undefined): PostType {
  return POST_TYPES.find((type) => type === value) ?? "article";
}

export interface DerivedMedia {
  readonly mediaType: MediaType;
  readonly mediaUrl: string;
}

export function deriveMedia(
  type: PostType,
  banner: string,
  link: string
): DerivedMedia {
  return match(type)
    .with("article", (): DerivedMedia => ({ mediaType: "none", mediaUrl: "" }))
    .with(
      "image",
      (): DerivedMedia => ({ mediaType: "image", mediaUrl: banner })
    )
    .with(
      "video",
      "youtube",
      (): DerivedMedia => ({ mediaType: "youtube", mediaUrl: link })
    )
    .with("pdf", (): DerivedMedia => ({ mediaType: "pdf", mediaUrl: link }))
    .exhaustive();
}

const MONTHS = [
  "Jan",
  "Feb",
  "Mar",
  "Apr",
  "May",
  "Jun",
  "Jul",
  "Aug",
  "Sep",
  "Oct",
  "Nov",
  "Dec"
];

/** `Oct 05, 2026` */
export function formatPostDate(date: Date): string {
  const day = String(date.getDate()).padStart(2, "0");
  return `${MONTHS[date.getMonth()]} ${day}, ${date.getFullYear()}`;
}

export function createPost(input: PostInput, now = new Date()): Post {
  return {
    id: randomUUID(),
    title: input.title,
    author: input.author,
    date: formatPostDate(now),
    type: input.type,
    banner: input.banner,
    content: input.content,
    ...deriveMedia(input.type, input.banner, input.mediaUrl)
  };
}

export function isPost(value: unknown): value is Post {
  return (
    typeof value === "object" &&
    value !== null &&
    "id" in value &&
    typeof value.id === "string"
  );
}
