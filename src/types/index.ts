export const MOODS = ['Calm', 'Focused', 'Curious', 'Hyped', 'Meh', 'Stressed', 'Sad'] as const;

export type Mood = (typeof MOODS)[number];

export const FEEDBACK_ACTIONS = [
  'MoreLikeThis',
  'GreatExplainer',
  'MoreLaunches',
  'TooIntense',
  'TooFluffy',
  'TooShort',
  'NotRelevant',
] as const;

export type FeedbackAction = (typeof FEEDBACK_ACTIONS)[number];

export const POSITIVE_ACTIONS: ReadonlySet<FeedbackAction> = new Set<FeedbackAction>([
  'MoreLikeThis',
  'GreatExplainer',
  'MoreLaunches',
]);

export type TrendLabel = 'NEW' | 'UP' | 'DOWN' | 'STEADY';

/** Numeric and label signals precomputed by the text-feature extractor. */
export interface MoodFeatures {
  arousal: number | null;
  sentiment: number | null;
  depth: number | null;
  conflict: number | null;
  practicality: number | null;
  optimism: number | null;
  novelty: number | null;
  humanInterest: number | null;
  hype: number | null;
  explainer: number | null;
  analysis: number | null;
  wholesome: number | null;
  readMinutes: number | null;
  genre: string | null;
  eventStage: string | null;
  format: string | null;
}

/** Article as read from the article store. Never mutated by ranking. */
export interface Article {
  id: string;
  url: string | null;
  sourceId: string | null;
  title: string;
  summary: string | null;
  imageUrl: string | null;
  publishedAt: Date;
  createdAt: Date;
  tags: string[];
  interestMatches: string[];
  vibe: string | null;
  features: MoodFeatures;
  embedding: number[] | null;
}

export interface RankedItem {
  articleId: string;
  title: string;
  sourceId: string;
  publishedAt: string;
  summary: string | null;
  imageUrl: string | null;
  scoreGlobal: number;
  heat: number;
  trend: TrendLabel;
  reasons: string[];
  topics: string[];
  clusterId: string;
  arousal: number | null;
}

export interface Snapshot {
  date: string;
  hour: number;
  updatedAt: string;
  items: RankedItem[];
}

export interface PulseItemView extends RankedItem {
  scorePersonal?: number;
  saved: boolean;
}

export interface TimelineHour {
  hour: number;
  count: number;
  updatedAt: string;
}

export interface PulseToday {
  date: string;
  currentHour: number;
  updatedAt: string | null;
  global: PulseItemView[];
  personal: PulseItemView[];
  timeline: TimelineHour[];
}

export interface MoodSetting {
  mood: Mood | null;
  blend: number;
}

export type FeatureType = 'source' | 'interest' | 'tag' | 'token' | 'genre' | 'event' | 'format';

export interface FeatureAffinity {
  userId: string;
  mood: Mood;
  type: FeatureType;
  key: string;
  score: number;
  count: number;
  updatedAt: string;
  /** Feedback event that produced this value; a redelivered event is not applied twice. */
  lastEventId: string | null;
}

export interface MoodCentroid {
  /** A user id, or null for the global per-mood centroid. */
  userId: string | null;
  mood: Mood;
  vector: number[];
  count: number;
  updatedAt: string;
  lastEventId: string | null;
}

export interface FeedbackEvent {
  id: string;
  userId: string;
  articleId: string;
  mood: Mood;
  action: FeedbackAction;
  positive: boolean;
  createdAt: string;
}

/** type -> key -> score, the read-side view of a user's learned affinities. */
export type AffinityProfile = Partial<Record<FeatureType, Map<string, number>>>;

export interface Interest {
  id: string;
  name: string;
}

// ---------------------------------------------------------------------------
// Collaborator contracts
// ---------------------------------------------------------------------------

export interface TimeWindowQuery {
  start: Date;
  end: Date;
  /** Which timestamp the window applies to. */
  field: 'publishedAt' | 'createdAt';
  limit: number;
}

export interface ArticleStore {
  queryByTimeWindow(query: TimeWindowQuery): Promise<Article[]>;
  getById(id: string): Promise<Article | null>;
  getByIds(ids: string[]): Promise<Article[]>;
}

export interface SnapshotHourEntry {
  hour: number;
  snapshot: Snapshot;
}

export interface SnapshotStore {
  get(date: string, hour: number): Promise<Snapshot | null>;
  set(date: string, hour: number, snapshot: Snapshot): Promise<void>;
  listHours(date: string): Promise<SnapshotHourEntry[]>;
  exists(date: string, hour: number): Promise<boolean>;
}

export interface AffinityStore {
  getAffinity(userId: string, mood: Mood, type: FeatureType, key: string): Promise<FeatureAffinity | null>;
  setAffinity(affinity: FeatureAffinity): Promise<void>;
  listAffinities(userId: string, mood: Mood): Promise<FeatureAffinity[]>;
  getCentroid(userId: string | null, mood: Mood): Promise<MoodCentroid | null>;
  setCentroid(centroid: MoodCentroid): Promise<void>;
  appendFeedback(event: FeedbackEvent): Promise<void>;
  hasFeedback(eventId: string): Promise<boolean>;
}

export interface UserStore {
  getMoodSetting(userId: string): Promise<MoodSetting | null>;
  getInterestNames(userId: string): Promise<string[]>;
  savedSet(userId: string, articleIds: string[]): Promise<Set<string>>;
  listInterests(): Promise<Interest[]>;
}

export interface RerankInput {
  id: string;
  title: string;
  sourceId: string;
  publishedAt: Date;
  summary: string | null;
  tags: string[];
}

export interface RerankPick {
  id: string;
  score: number;
  reasons: string[];
}

export interface RerankerClient {
  rerank(items: RerankInput[], topK: number, signal?: AbortSignal): Promise<RerankPick[]>;
}

export interface EmbeddingProvider {
  embed(text: string, signal?: AbortSignal): Promise<number[]>;
}

export interface MoodCentroids {
  user: number[] | null;
  global: number[] | null;
}

/** Read side of the learning state, consumed by the personal overlay. */
export interface LearningStateReader {
  getProfile(userId: string, mood: Mood): Promise<AffinityProfile>;
  getCentroids(userId: string, mood: Mood): Promise<MoodCentroids>;
}
