export enum MediaType {
  PHOTO = "photo",
  VIDEO = "video",
  CAROUSEL = "carousel",
}

const TYPENAME_MEDIA = new Map<string, MediaType>([
  ["GraphImage", MediaType.PHOTO],
  ["GraphVideo", MediaType.VIDEO],
  ["GraphSidecar", MediaType.CAROUSEL],
]);

/**
 * Map the remote `__typename` (plus the `is_video` flag some layouts carry)
 * onto a media type. Unknown names count as photos.
 */
export function toMediaType(typename?: string, isVideo?: boolean): MediaType {
  const known = typename === undefined ? undefined : TYPENAME_MEDIA.get(typename);
  return known ?? (isVideo ? MediaType.VIDEO : MediaType.PHOTO);
}
