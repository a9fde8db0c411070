export interface Annotation {
  content: string;
  createdAt: number; // ms since Unix epoch
}

export interface AnnotationStoreOptions {
  filePath: string;
  clock?: () => number;
  log?: (message: string) => void;
}
