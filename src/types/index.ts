export type QuotaKind = 'read' | 'write';

export interface QuotaRecord {
    period: string; // UTC month key, e.g. "2025-05"
    readsUsed: number;
    writesUsed: number;
    lastReset: string;
}

export interface QuotaUsage {
    used: number;
    remaining: number;
    cap: number;
}

export interface QuotaStatus {
    period: string;
    read: QuotaUsage;
    write: QuotaUsage;
}

export interface PostedItemRecord {
    identifier: string;
    postedAt: string;
}

export interface ContentAttributes {
    hasEmoji: boolean;
    hasQuestion: boolean;
    hasHashtag: boolean;
    hasLink: boolean;
    wordCount: number;
    charCount: number;
}

export interface EngagementMetrics {
    likes: number;
    reshares: number;
    replies: number;
    impressions: number;
}

export interface PostOutcomeRecord {
    postId: string;
    text: string;
    category: string;
    postedAt: string;
    timeSlot: string;
    attributes: ContentAttributes;
    engagement?: EngagementMetrics;
    engagementRate?: number;
    collectedAt?: string;
}

export interface RankedScore {
    key: string;
    avgEngagementRate: number;
    posts: number;
}

export interface StyleRecommendation {
    useEmoji: boolean;
    useQuestion: boolean;
}

export interface LearningInsights {
    perCategoryAvgEngagement: Record<string, number>;
    rankedCategories: RankedScore[];
    rankedTimeSlots: RankedScore[];
    styleRecommendations: Record<string, StyleRecommendation>;
    lastUpdated: string;
    sampleSize: number;
}

// Collaborator boundary DTOs

export interface CandidateItem {
    identifier: string;
    title: string;
    sourceUrl: string;
}

export interface PromptContext {
    system: string;
    user: string;
    maxTokens: number;
    temperature: number;
}

export type PublishErrorKind = 'permission_denied' | 'duplicate' | 'transient' | 'unknown';

export interface PublishResult {
    success: boolean;
    postId?: string;
    errorKind?: PublishErrorKind;
    message?: string;
    // Platform reported its own monthly usage cap as exceeded
    usageCapExceeded?: boolean;
}

export interface Collaborators {
    fetchCandidateItems(category: string): Promise<CandidateItem[]>;
    generateText(prompt: PromptContext): Promise<string>;
    publish(text: string): Promise<PublishResult>;
    fetchEngagement(postIds: string[]): Promise<Record<string, EngagementMetrics>>;
    shortenUrl(url: string): Promise<string>;
}

export type Clock = () => Date;
