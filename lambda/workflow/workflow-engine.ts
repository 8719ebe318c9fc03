import { v4 as uuidv4 } from 'uuid';
import { AuthorRotationManager } from '../authors/author-rotation-manager';
import { ContentValidator } from '../content/content-validator';
import { SeoTagGenerator } from '../content/seo-tag-generator';
import { ImageAcquirer, MAX_ARTICLE_IMAGES } from '../images/image-acquisition';
import { PublishingAgentRegistry } from '../publishing/publishing-agent-registry';
import { CmsClientFactory } from '../publishing/wordpress-client';
import { AutomationRepository } from '../repositories/automation-repository';
import { ErrorHandler, STORAGE_RETRY_CONFIG } from '../utils/error-handler';
import { WorkflowNotifier } from '../utils/notifier';
import { DEFAULT_TARGET_WORDS, GeneratedContent, GenerationRequest } from './content-generator';
import { AttemptOutcome, errorMessage } from './result';
import { TopicSelector } from './topic-selector';
import {
  Article,
  AutomationRule,
  Blog,
  ContentMetrics,
  SocialPostReference,
  Topic,
  WorkflowMetrics,
  WorkflowResult,
  WorkflowStatus,
  WorkflowStep,
} from './types';
import { computeWorkflowMetrics, MetricsSink } from './workflow-metrics';
import { serializeWorkflowResult } from './workflow-result-codec';

export const DEFAULT_MAX_RETRIES = 2;
export const MAX_VALIDATION_ISSUES = 3;

/** One generation attempt; implemented by ContentGenerator. */
export interface ArticleGenerator {
  attempt(request: GenerationRequest): Promise<AttemptOutcome<GeneratedContent>>;
}

export interface WorkflowEngineDeps {
  repository: AutomationRepository;
  topicSelector: TopicSelector;
  generator: ArticleGenerator;
  validator: ContentValidator;
  tagGenerator: SeoTagGenerator;
  images: ImageAcquirer;
  cmsClientFactory: CmsClientFactory;
  rotation: AuthorRotationManager;
  social: PublishingAgentRegistry;
  notifier: WorkflowNotifier;
  errorHandler: ErrorHandler;
  metricsSink?: MetricsSink;
  clock?: () => Date;
  maxRetries?: number;
}

interface RunState {
  workflowId: string;
  ruleId: string;
  status: WorkflowStatus;
  stepsCompleted: WorkflowStep[];
  stepsFailed: WorkflowStep[];
  errors: string[];
  articleId: string | null;
  wordpressPostId: number | null;
  socialMediaPosts: SocialPostReference[];
  startedAt: Date;
  completedAt?: Date;
  failedAt?: Date;
  generationAttempts: number;
  validationWarnings: number;
  blogId: string;
  article?: Article;
}

interface AcceptedContent {
  content: GeneratedContent;
  warnings: number;
}

/**
 * Runs one automation rule end to end: topic pool, topic reservation,
 * generation behind the quality gate, images, publishing, social posts and
 * metrics. Every failure is recorded on the returned result; nothing throws
 * out of run().
 */
export class WorkflowEngine {
  private readonly now: () => Date;
  private readonly maxRetries: number;

  constructor(private readonly deps: WorkflowEngineDeps) {
    this.now = deps.clock ?? (() => new Date());
    this.maxRetries = deps.maxRetries ?? DEFAULT_MAX_RETRIES;
  }

  /** Loads the rule first; a missing rule fails and an inactive one is reported as paused. */
  async runById(ruleId: string): Promise<WorkflowResult> {
    let rule: AutomationRule | null;
    try {
      rule = await this.deps.repository.getAutomationRule(ruleId);
    } catch (error) {
      const state = this.newState(ruleId, '');
      await this.recordUnexpected(state, error, `Automation rule ${ruleId} could not be loaded`);
      return this.finalize(state);
    }

    if (!rule) {
      const state = this.newState(ruleId, '');
      this.hardFail(state, null, `Automation rule ${ruleId} not found`);
      return this.finalize(state);
    }

    return this.run(rule);
  }

  async run(rule: AutomationRule): Promise<WorkflowResult> {
    const state = this.newState(rule.id, rule.blogId);

    if (!rule.active) {
      console.log(`Automation rule ${rule.id} is inactive, skipping run ${state.workflowId}`);
      state.status = 'paused';
      const paused = this.freeze(state, this.metricsFor(state));
      await this.persistRecord(paused);
      return paused;
    }

    console.log(`Starting workflow ${state.workflowId} for automation rule ${rule.name}`);
    state.status = 'running';

    try {
      await this.executeSteps(rule, state);
    } catch (error) {
      await this.recordUnexpected(state, error, `Automation rule '${rule.name}' failed`);
    }

    return this.finalize(state);
  }

  private newState(ruleId: string, blogId: string): RunState {
    return {
      workflowId: `workflow_${ruleId}_${uuidv4()}`,
      ruleId,
      status: 'pending',
      stepsCompleted: [],
      stepsFailed: [],
      errors: [],
      articleId: null,
      wordpressPostId: null,
      socialMediaPosts: [],
      startedAt: this.now(),
      generationAttempts: 0,
      validationWarnings: 0,
      blogId,
    };
  }

  private async executeSteps(rule: AutomationRule, state: RunState): Promise<void> {
    const blog = await this.deps.repository.getBlog(rule.blogId);
    if (!blog) {
      return this.hardFail(state, 'topic_management', `Topic management failed: Blog ${rule.blogId} not found`);
    }

    const pool = await this.deps.topicSelector.ensureTopicPool(rule, blog);
    if (!pool.ok) {
      return this.hardFail(state, 'topic_management', `Topic management failed: ${pool.error}`);
    }
    for (const category of pool.value.skippedCategories) {
      console.warn(`Workflow ${state.workflowId}: no new topics for category ${category}`);
    }
    state.stepsCompleted.push('topic_management');

    const selection = await this.deps.topicSelector.selectAndReserve(rule);
    if (!selection.ok) {
      return this.hardFail(state, 'topic_selection', `Topic selection failed: ${selection.error}`);
    }
    const topic = selection.value;
    state.stepsCompleted.push('topic_selection');

    const article = await this.generateArticle(rule, blog, topic, state);
    if (!article) {
      return;
    }
    state.stepsCompleted.push('content_generation');

    await this.acquireImages(article, state);

    if (!rule.autoPublish) {
      console.log(`Rule ${rule.id} does not auto-publish, article ${article.id} left as ${article.status}`);
      return;
    }

    const published = await this.publish(rule, blog, topic, article, state);
    if (published && rule.autoSocialPost) {
      await this.postToSocial(blog, article, state);
    }
  }

  private async generateArticle(rule: AutomationRule, blog: Blog, topic: Topic, state: RunState): Promise<Article | null> {
    const maxAttempts = this.maxRetries + 1;
    const validator = this.deps.validator.forLanguage(blog.language);
    let accepted: AcceptedContent | null = null;
    let lastReason = 'no attempts made';

    for (let attempt = 1; attempt <= maxAttempts && !accepted; attempt++) {
      state.generationAttempts = attempt;
      console.log(`Generating article for topic ${topic.id}, attempt ${attempt}/${maxAttempts}`);

      const outcome = await this.deps.generator.attempt({
        topic,
        blog,
        targetWords: rule.articleLength ?? DEFAULT_TARGET_WORDS,
      });

      if (outcome.kind === 'fatal') {
        lastReason = outcome.reason;
        break;
      }
      if (outcome.kind === 'retryable') {
        lastReason = outcome.reason;
        console.warn(`Attempt ${attempt} failed: ${outcome.reason}`);
        continue;
      }

      const { title, excerpt, body } = outcome.value;
      const report = validator.validate(title, excerpt, body, topic.category);
      if (report.errors.length > MAX_VALIDATION_ISSUES && attempt < maxAttempts) {
        lastReason = `Validation failed with ${report.errors.length} issues`;
        console.warn(`Attempt ${attempt} rejected by validation: ${report.errors.join('; ')}`);
        continue;
      }
      if (report.errors.length > 0) {
        console.warn(`Accepting article with ${report.errors.length} validation warning(s): ${report.errors.join('; ')}`);
      }
      accepted = { content: outcome.value, warnings: report.errors.length };
    }

    if (!accepted) {
      this.hardFail(state, 'content_generation', `Content generation failed: ${lastReason}`);
      return null;
    }

    const { content, warnings } = accepted;
    state.validationWarnings = warnings;

    const article: Article = {
      id: uuidv4(),
      blogId: blog.id,
      topicId: topic.id,
      title: content.title,
      body: content.body,
      excerpt: content.excerpt,
      tags: this.deps.tagGenerator.generate(content.title, content.body, topic.category),
      category: topic.category,
      status: 'ready',
      wordpressPostId: null,
      images: [],
      validationWarnings: warnings,
      createdAt: this.now().toISOString(),
    };

    try {
      await this.saveArticle(article, state);
    } catch (error) {
      this.hardFail(state, 'content_generation', `Content generation failed: could not save article: ${errorMessage(error)}`);
      return null;
    }

    state.articleId = article.id;
    state.article = article;
    console.log(`Article ${article.id} saved: ${article.title}`);
    return article;
  }

  private async acquireImages(article: Article, state: RunState): Promise<void> {
    try {
      const images = await this.deps.images.acquire(
        { articleId: article.id, blogId: article.blogId, title: article.title, category: article.category },
        MAX_ARTICLE_IMAGES
      );
      if (images.length === 0) {
        this.softFail(state, 'image_acquisition', 'Image acquisition failed: No images found');
        return;
      }

      article.images = images.slice(0, MAX_ARTICLE_IMAGES);
      article.featuredImageUrl = article.images[0].url;
      await this.saveArticle(article, state);
      state.stepsCompleted.push('image_acquisition');
    } catch (error) {
      this.softFail(state, 'image_acquisition', `Image acquisition failed: ${errorMessage(error)}`);
    }
  }

  private async publish(rule: AutomationRule, blog: Blog, topic: Topic, article: Article, state: RunState): Promise<boolean> {
    const cms = this.deps.cmsClientFactory(blog);
    const author = await this.deps.rotation.selectPublishingAuthor(blog, rule.dailyQuota, topic.category, topic.id);

    let categoryId = blog.defaultCategoryId ?? 1;
    try {
      const found = await cms.findCategoryId(article.category);
      if (found !== null) {
        categoryId = found;
      } else {
        console.warn(`Category ${article.category} not found on ${blog.name}, using ${categoryId}`);
      }
    } catch (error) {
      state.errors.push(`Category lookup failed, using default category: ${errorMessage(error)}`);
    }

    let tagIds: number[] = [];
    try {
      tagIds = await cms.createOrFindTags(article.tags);
    } catch (error) {
      state.errors.push(`Tag resolution failed: ${errorMessage(error)}`);
    }

    let featuredMediaId: number | undefined;
    const featured = article.images[0];
    if (featured) {
      try {
        const bytes = await this.deps.images.loadImageBytes(featured);
        featuredMediaId = await cms.uploadMedia(bytes, featured.key.split('/').pop() ?? `${article.id}.jpg`, 'image/jpeg');
      } catch (error) {
        state.errors.push(`Featured image upload failed: ${errorMessage(error)}`);
      }
    }

    try {
      const post = await cms.createPost({
        title: article.title,
        content: article.body,
        excerpt: article.excerpt,
        status: 'publish',
        authorId: author.id,
        categoryIds: [categoryId],
        tagIds,
        featuredMediaId,
      });

      article.status = 'published';
      article.wordpressPostId = post.id;
      article.postUrl = post.link;
      article.authorId = author.id;
      article.publishedAt = this.now().toISOString();
      state.wordpressPostId = post.id;
      state.stepsCompleted.push('publishing');
      console.log(`Article ${article.id} published as post ${post.id} by author ${author.name}`);
    } catch (error) {
      this.softFail(state, 'publishing', `WordPress publishing failed: ${errorMessage(error)}`);
      article.status = 'failed';
    }

    try {
      await this.saveArticle(article, state);
    } catch (error) {
      state.errors.push(`Failed to record publication of article ${article.id}: ${errorMessage(error)}`);
    }

    return article.status === 'published';
  }

  private async postToSocial(blog: Blog, article: Article, state: RunState): Promise<void> {
    const results = await this.deps.social.publishToAccounts(blog.socialAccounts, {
      title: article.title,
      excerpt: article.excerpt,
      url: article.postUrl ?? `${blog.url.replace(/\/+$/, '')}/?p=${article.wordpressPostId ?? ''}`,
      tags: article.tags,
      imageUrl: article.featuredImageUrl,
    });

    let failures = 0;
    for (const { account, result } of results) {
      if (result.success) {
        state.socialMediaPosts.push({ platform: account.platform, postId: result.platformId, url: result.platformUrl });
      } else {
        failures++;
        state.errors.push(`Social posting to ${account.platform} (${account.name}) failed: ${result.error ?? 'unknown error'}`);
      }
    }

    if (failures > 0) {
      state.stepsFailed.push('social_posting');
    } else {
      state.stepsCompleted.push('social_posting');
    }
  }

  /** Metrics always run, after a hard failure too. The result is frozen here. */
  private async finalize(state: RunState): Promise<WorkflowResult> {
    if (state.status === 'running') {
      state.status = 'completed';
      state.completedAt = this.now();
    } else {
      state.failedAt = state.failedAt ?? this.now();
    }

    state.stepsCompleted.push('metrics_update');

    if (state.articleId) {
      try {
        await this.deps.repository.saveContentMetrics(this.contentMetrics(state));
      } catch (error) {
        state.stepsCompleted.pop();
        this.softFail(state, 'metrics_update', `Metrics update failed: ${errorMessage(error)}`);
      }
    }

    const result = this.freeze(state, this.metricsFor(state));
    await this.persistRecord(result);

    if (this.deps.metricsSink) {
      try {
        await this.deps.metricsSink.publish(result);
      } catch (error) {
        console.error('Failed to publish workflow metrics:', errorMessage(error));
      }
    }

    if (result.status === 'completed') {
      await this.deps.notifier.notify({
        title: 'Workflow completed successfully',
        message: state.article
          ? `Article '${state.article.title}' was generated and processed`
          : `Workflow ${result.workflowId} completed`,
        type: state.errors.length > 0 ? 'warning' : 'success',
        ruleId: result.ruleId,
        workflowId: result.workflowId,
      });
    } else if (!result.errors.some(error => error.startsWith('Unexpected error'))) {
      await this.deps.notifier.notify({
        title: 'Workflow failed',
        message: result.errors.join('; '),
        type: 'error',
        ruleId: result.ruleId,
        workflowId: result.workflowId,
      });
    }

    console.log(`Workflow ${result.workflowId} finished with status ${result.status}`, JSON.stringify(result.metrics));
    return result;
  }

  private async recordUnexpected(state: RunState, error: unknown, context: string): Promise<void> {
    console.error(`Workflow ${state.workflowId} failed with exception:`, error);
    state.status = 'failed';
    state.failedAt = this.now();
    state.errors.push(`Unexpected error: ${errorMessage(error)}`);
    await this.deps.notifier.diagnose(error instanceof Error ? error : new Error(String(error)), {
      title: 'Workflow failed',
      message: `${context}: ${errorMessage(error)}`,
      ruleId: state.ruleId,
      workflowId: state.workflowId,
    });
  }

  private contentMetrics(state: RunState): ContentMetrics {
    const finishedAt = state.completedAt ?? state.failedAt ?? this.now();
    return {
      id: uuidv4(),
      workflowId: state.workflowId,
      ruleId: state.ruleId,
      blogId: state.blogId,
      articleId: state.articleId ?? '',
      executionTime: (finishedAt.getTime() - state.startedAt.getTime()) / 1000,
      stepsCompleted: state.stepsCompleted.length,
      success: state.status === 'completed',
      errorDetails: state.errors.length > 0 ? state.errors.join('; ') : null,
      createdAt: this.now().toISOString(),
    };
  }

  private metricsFor(state: RunState): WorkflowMetrics {
    return computeWorkflowMetrics({
      startedAt: state.startedAt,
      finishedAt: state.completedAt ?? state.failedAt ?? this.now(),
      stepsCompleted: state.stepsCompleted,
      stepsFailed: state.stepsFailed,
      articleId: state.articleId,
      wordpressPostId: state.wordpressPostId,
      socialPostsCreated: state.socialMediaPosts.length,
      generationAttempts: state.generationAttempts,
      validationWarnings: state.validationWarnings,
    });
  }

  private freeze(state: RunState, metrics: WorkflowMetrics): WorkflowResult {
    const result: WorkflowResult = {
      workflowId: state.workflowId,
      ruleId: state.ruleId,
      status: state.status,
      stepsCompleted: Object.freeze([...state.stepsCompleted]),
      stepsFailed: Object.freeze([...state.stepsFailed]),
      errors: Object.freeze([...state.errors]),
      articleId: state.articleId,
      wordpressPostId: state.wordpressPostId,
      socialMediaPosts: Object.freeze(state.socialMediaPosts.map(post => Object.freeze({ ...post }))),
      startedAt: state.startedAt,
      completedAt: state.completedAt,
      failedAt: state.failedAt,
      metrics: Object.freeze(metrics),
    };
    return Object.freeze(result);
  }

  private async persistRecord(result: WorkflowResult): Promise<void> {
    try {
      await this.deps.repository.saveWorkflowResult(serializeWorkflowResult(result));
    } catch (error) {
      console.error(`Failed to store workflow result ${result.workflowId}:`, errorMessage(error));
    }
  }

  private async saveArticle(article: Article, state: RunState): Promise<void> {
    await this.deps.errorHandler.retryWithBackoff(
      () => this.deps.repository.saveArticle({ ...article, images: [...article.images], tags: [...article.tags] }),
      STORAGE_RETRY_CONFIG,
      { functionName: 'blog-automation', operation: 'save_article', workflowId: state.workflowId, articleId: article.id }
    );
  }

  private hardFail(state: RunState, step: WorkflowStep | null, message: string): void {
    console.error(`Workflow ${state.workflowId}: ${message}`);
    state.status = 'failed';
    state.failedAt = this.now();
    if (step) {
      state.stepsFailed.push(step);
    }
    state.errors.push(message);
  }

  private softFail(state: RunState, step: WorkflowStep, message: string): void {
    console.warn(`Workflow ${state.workflowId}: ${message}`);
    state.stepsFailed.push(step);
    state.errors.push(message);
  }
}
