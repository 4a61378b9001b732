export type DeliverableMediaType = "image" | "video" | "gifv";

export type MediaRef = {
  readonly type: string;
  readonly url: string | null;
  readonly previewUrl: string | null;
};

export type Author = {
  readonly username: string | null;
  readonly displayName: string | null;
};

export type RawItem = {
  readonly id: string;
  readonly createdAt: string;
  readonly content: string;
  readonly author: Author;
  readonly mediaAttachments: ReadonlyArray<MediaRef>;
};

export type DeliverableMedia = {
  readonly type: DeliverableMediaType;
  readonly url: string;
};

export type Notification = {
  readonly text: string;
  readonly media: ReadonlyArray<DeliverableMedia>;
};

export type RelayedMedia = {
  readonly data: Uint8Array;
  readonly filename: string;
  readonly contentType: string;
};

export type NotificationPayload = {
  readonly text: string;
  readonly attachments: ReadonlyArray<RelayedMedia>;
};

export type CycleResult = {
  readonly fetchedCount: number;
  readonly skippedCount: number;
  readonly deliveredCount: number;
  readonly failedCount: number;
};
