export interface RetryPolicy {
  maxAttempts: number;
  delayMs: number;
}

export interface Labels {
  untitled: string;
  volume: string;
  chapter: string;
  titlePage: string;
  cover: string;
  description: string;
  contents: string;
  contentsHint: string;
  next: string;
}

export interface PipelineOptions {
  apiBaseUrl: string;
  siteOrigin: string;
  retry: RetryPolicy;
  imageQuality: number;
  language: string;
  labels: Labels;
  recordFileName: string;
  imagesDirName: string;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 5,
  delayMs: 1000,
};

export const DEFAULT_OPTIONS: PipelineOptions = {
  apiBaseUrl: 'https://api2.mangalib.me',
  siteOrigin: 'https://ranobelib.me',
  retry: DEFAULT_RETRY_POLICY,
  imageQuality: 85,
  language: 'ru',
  labels: {
    untitled: 'Без названия',
    volume: 'Том',
    chapter: 'Глава',
    titlePage: 'Титульная страница',
    cover: 'Обложка',
    description: 'Описание',
    contents: 'Содержание',
    contentsHint: 'Используйте оглавление или кнопку «Далее».',
    next: 'Далее',
  },
  recordFileName: 'ranobe.json',
  imagesDirName: 'imgs',
};

export type PipelineOverrides = Partial<Omit<PipelineOptions, 'retry' | 'labels'>> & {
  retry?: Partial<RetryPolicy>;
  labels?: Partial<Labels>;
};

export function resolveOptions(overrides: PipelineOverrides = {}): PipelineOptions {
  return {
    ...DEFAULT_OPTIONS,
    ...overrides,
    retry: { ...DEFAULT_OPTIONS.retry, ...overrides.retry },
    labels: { ...DEFAULT_OPTIONS.labels, ...overrides.labels },
  };
}
