// pattern: Functional Core
import { z } from "zod";
import type {
  DeliverableMedia,
  DeliverableMediaType,
  MediaRef,
  RawItem,
} from "./types";

const mediaAttachmentSchema = z.object({
  type: z.string().catch("unknown"),
  url: z.string().nullish(),
  preview_url: z.string().nullish(),
});

/**
 * Shape of a status as returned by the Mastodon-compatible statuses endpoint.
 * Only `id` is mandatory; everything else degrades to an empty value.
 */
export const upstreamStatusSchema = z.object({
  id: z.string().min(1),
  created_at: z.string().nullish(),
  content: z.string().nullish(),
  text: z.string().nullish(),
  account: z
    .object({
      username: z.string().nullish(),
      display_name: z.string().nullish(),
    })
    .nullish(),
  media_attachments: z.array(mediaAttachmentSchema).nullish(),
});

export const accountLookupSchema = z.object({
  id: z.string().min(1),
});

export type UpstreamStatus = z.infer<typeof upstreamStatusSchema>;

export function toRawItem(status: UpstreamStatus): RawItem {
  return {
    id: status.id,
    createdAt: status.created_at ?? "",
    content: status.content || status.text || "",
    author: {
      username: status.account?.username ?? null,
      displayName: status.account?.display_name ?? null,
    },
    mediaAttachments: (status.media_attachments ?? []).map(
      (m): MediaRef => ({
        type: m.type,
        url: m.url ?? null,
        previewUrl: m.preview_url ?? null,
      }),
    ),
  };
}

export function isDeliverableType(type: string): type is DeliverableMediaType {
  return type === "image" || type === "video" || type === "gifv";
}

/**
 * Keeps attachments of a deliverable type that have somewhere to download
 * from, preferring `url` over `previewUrl`.
 */
export function selectDeliverableMedia(
  refs: ReadonlyArray<MediaRef>,
): Array<DeliverableMedia> {
  const selected: Array<DeliverableMedia> = [];
  for (const ref of refs) {
    const url = ref.url || ref.previewUrl;
    if (isDeliverableType(ref.type) && url) {
      selected.push({ type: ref.type, url });
    }
  }
  return selected;
}
