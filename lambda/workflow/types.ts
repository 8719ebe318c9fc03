// Domain types shared by the workflow engine, repositories and adapters

export type SocialPlatform = 'linkedin' | 'facebook';

export interface SocialAccount {
  id: string;
  platform: SocialPlatform;
  name: string;
  accessToken: string;
  accountId: string;
  active: boolean;
}

export interface Blog {
  id: string;
  name: string;
  url: string;
  apiUrl: string;
  username: string;
  apiToken: string;
  language: string;
  defaultCategoryId?: number;
  socialAccounts: SocialAccount[];
  active: boolean;
}

export interface AutomationRule {
  id: string;
  name: string;
  blogId: string;
  categories: string[];
  autoPublish: boolean;
  autoSocialPost: boolean;
  autoApproveTopics: boolean;
  dailyQuota: number;
  active: boolean;
  articleLength?: number;
}

export type TopicStatus = 'pending' | 'approved' | 'in_progress' | 'used' | 'rejected' | 'error';

export interface Topic {
  id: string;
  blogId: string;
  title: string;
  category: string;
  priority: number;
  status: TopicStatus;
  createdAt: string;
  used: boolean;
  usedAt?: string;
}

export type ArticleStatus = 'draft' | 'ready' | 'published' | 'failed';

export interface StoredImage {
  key: string;
  url: string;
  sourceUrl: string;
  source: string;
  attribution: string;
  width: number;
  height: number;
}

export interface Article {
  id: string;
  blogId: string;
  topicId: string;
  title: string;
  body: string;
  excerpt: string;
  tags: string[];
  category: string;
  status: ArticleStatus;
  wordpressPostId: number | null;
  postUrl?: string;
  authorId?: number;
  featuredImageUrl?: string;
  images: StoredImage[];
  validationWarnings: number;
  createdAt: string;
  publishedAt?: string;
}

export interface Author {
  id: number;
  name: string;
  specialties: string[];
  weight: number;
}

export type WorkflowStatus = 'pending' | 'running' | 'completed' | 'failed' | 'paused';

export type WorkflowStep =
  | 'topic_management'
  | 'topic_selection'
  | 'content_generation'
  | 'image_acquisition'
  | 'publishing'
  | 'social_posting'
  | 'metrics_update';

export const TOTAL_WORKFLOW_STEPS = 7;

export interface SocialPostReference {
  platform: SocialPlatform;
  postId?: string;
  url?: string;
}

export interface WorkflowMetrics {
  executionTimeSeconds: number;
  stepsCompleted: number;
  stepsFailed: number;
  successRate: number;
  articleGenerated: boolean;
  wordpressPublished: boolean;
  socialPostsCreated: number;
  generationAttempts: number;
  validationWarnings: number;
}

export interface WorkflowResult {
  readonly workflowId: string;
  readonly ruleId: string;
  readonly status: WorkflowStatus;
  readonly stepsCompleted: readonly WorkflowStep[];
  readonly stepsFailed: readonly WorkflowStep[];
  readonly errors: readonly string[];
  readonly articleId: string | null;
  readonly wordpressPostId: number | null;
  readonly socialMediaPosts: readonly SocialPostReference[];
  readonly startedAt: Date;
  readonly completedAt?: Date;
  readonly failedAt?: Date;
  readonly metrics: Readonly<WorkflowMetrics>;
}

export interface ContentMetrics {
  id: string;
  workflowId: string;
  ruleId: string;
  blogId: string;
  articleId: string;
  executionTime: number;
  stepsCompleted: number;
  success: boolean;
  errorDetails: string | null;
  createdAt: string;
}

export type NotificationType = 'info' | 'success' | 'warning' | 'error';

export interface Notification {
  id: string;
  title: string;
  message: string;
  type: NotificationType;
  ruleId?: string;
  workflowId?: string;
  read: boolean;
  createdAt: string;
}
