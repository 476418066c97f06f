export type IsoDateTime = string;

/** One feed entry, serialized as-is into the JSONL output. */
export interface PaperRecord {
  id: string | null;
  title: string | null;
  summary: string | null;
  published: IsoDateTime | null;
  updated: IsoDateTime | null;
  authors: string[];
  pdf_url: string | null;
}

export interface AppConfig {
  subjects: string[]; // arXiv category codes, e.g. cs.SE
  storage: {
    root: string;
  };
  fetch: {
    baseUrl: string;
    maxResults: number;
    start: number;
  };
  output: {
    overwriteExisting: boolean;
    mirror: {
      enabled: boolean;
      fileName: string; // written under storage.root
    };
  };
}
