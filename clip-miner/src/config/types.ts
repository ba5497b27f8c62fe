/** What the acquisition step should fetch */
export type MediaKind = "audio" | "audio+video";

/** Client-identity emulation used by the native extractor */
export type NativeStrategyName = "browser" | "mobile-app" | "randomized";

/** Similarity scorer used by the consensus engine */
export type ScorerKind = "fuzzy" | "exact";

/** Paths of the external tools the pipeline shells out to */
export interface ToolsConfig {
  ffmpeg: string;
  ytDlp: string;
  fpcalc: string;
  /** Maximum number of external tool processes running at once */
  concurrency: number;
  /** Timeout for a single tool run */
  timeoutMs: number;
}

/** Platform-specific relay (tikwm) configuration */
export interface TikwmConfig {
  enabled: boolean;
  endpoint: string;
}

/** Universal relay (cobalt) configuration */
export interface CobaltConfig {
  enabled: boolean;
  endpoint: string;
  /** Optional API key, sent as "Authorization: Api-Key <key>" */
  apiKey?: string;
}

/** Native extractor (yt-dlp) configuration */
export interface NativeConfig {
  enabled: boolean;
  /** Strategies tried in order */
  strategies: NativeStrategyName[];
  /** Delay range used by the randomized strategy before its attempt */
  randomDelayMs: { min: number; max: number };
}

export interface AcquisitionConfig {
  tikwm: TikwmConfig;
  cobalt: CobaltConfig;
  native: NativeConfig;
}

export interface AcoustIdConfig {
  enabled: boolean;
  apiKey: string;
  endpoint: string;
}

export interface AuddConfig {
  enabled: boolean;
  endpoint: string;
  /** Anonymous calls are rate limited; a token lifts the limit */
  apiToken?: string;
}

export interface RecognitionConfig {
  /** Sample rate of the normalized mono WAV fed to fingerprinters */
  sampleRate: number;
  audd: AuddConfig;
  /** Only used when an API key is present */
  acoustid: AcoustIdConfig;
}

export interface ConsensusConfig {
  scorer: ScorerKind;
  /** A pair agrees when its score is strictly above this (0-100) */
  agreementThreshold: number;
  /** Status given to a lone signal; never CONFIRMED */
  singleSourceStatus: "SINGLE_SOURCE" | "UNCERTAIN";
}

export interface MasterConfig {
  enabled: boolean;
  queryQualifier: string;
  searchCount: number;
  minDurationSeconds: number;
  maxDurationSeconds: number;
  /** When false both bounds are exclusive */
  inclusiveBounds: boolean;
  audioFormat: string;
  /** yt-dlp --audio-quality value (0 = best VBR) */
  audioQuality: string;
}

/** Top-level config file schema */
export interface Config {
  outputDir: string;
  stagingDir: string;
  /** Defaults to error_log.txt inside outputDir */
  errorLogPath?: string;
  mediaKind: MediaKind;
  /** Number of batch items processed at once */
  concurrency: number;
  requestTimeoutMs: number;
  /** Hostnames (subdomains included) that URL extraction accepts */
  knownDomains: string[];
  tools: ToolsConfig;
  acquisition: AcquisitionConfig;
  recognition: RecognitionConfig;
  consensus: ConsensusConfig;
  master: MasterConfig;
}

/** CLI flags */
export interface CliFlags {
  config?: string;
  output?: string;
  media?: "audio" | "video";
  concurrency?: number;
  "skip-master": boolean;
  debug: boolean;
}

/** Callback for progress updates */
export type ProgressCallback = (message: string) => void;
