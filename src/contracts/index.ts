export type {
  SourceKind,
  NewsItem,
  ContentResult,
  ImageSource,
  RunOptions,
  PostRecord,
} from "./types";
export { IMAGE_SOURCES, isImageSource } from "./types";
