const SIZE_SEGMENT = /\/(?:236x|474x|564x|736x)\//;

/**
 * Rewrite a thumbnail pinimg URL to its full-resolution variant:
 * https://i.pinimg.com/236x/ab/cd/x.jpg → https://i.pinimg.com/originals/ab/cd/x.jpg
 * URLs without a size segment are returned unchanged.
 */
export function toOriginalsUrl(imageRef: string): string {
  return imageRef.replace(SIZE_SEGMENT, '/originals/');
}
