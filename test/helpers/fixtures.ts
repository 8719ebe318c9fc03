import { AutomationRule, Blog, SocialAccount, Topic } from '../../lambda/workflow/types';

export const SENTENCE = 'Codzienna pielęgnacja skóry wymaga cierpliwości, regularności i dobrze dobranych kosmetyków dopasowanych do potrzeb.';

const HEADINGS = ['Pierwsze kroki w pielęgnacji', 'Dobór kosmetyków do cery', 'Plan na każdy dzień'];

/**
 * Nine paragraphs of seven sentences with a heading before paragraphs 2, 5
 * and 8: 831 words and 7444 characters once markup is stripped.
 */
export function validBody(): string {
  const paragraph = Array.from({ length: 7 }, () => SENTENCE).join(' ');
  const blocks: string[] = [];
  for (let i = 0; i < 9; i++) {
    if (i === 1 || i === 4 || i === 7) {
      blocks.push(`<h2>${HEADINGS[(i - 1) / 3]}</h2>`);
    }
    blocks.push(`<p>${paragraph}</p>`);
  }
  return blocks.join('\n');
}

export const VALID_TITLE = 'Pielęgnacja skóry krok po kroku';
export const VALID_EXCERPT = 'Poznaj prosty plan codziennej pielęgnacji skóry i dobierz kosmetyki do swoich potrzeb.';

export function generatedArticleJson(overrides: { title?: string; excerpt?: string; content?: string } = {}): string {
  return JSON.stringify({
    title: overrides.title ?? VALID_TITLE,
    excerpt: overrides.excerpt ?? VALID_EXCERPT,
    content: overrides.content ?? validBody(),
  });
}

export function makeSocialAccount(overrides: Partial<SocialAccount> = {}): SocialAccount {
  return {
    id: 'account-1',
    platform: 'linkedin',
    name: 'Company page',
    accessToken: 'test-token',
    accountId: '12345',
    active: true,
    ...overrides,
  };
}

export function makeBlog(overrides: Partial<Blog> = {}): Blog {
  return {
    id: 'blog-1',
    name: 'pielegnacja-codzienna.pl',
    url: 'https://pielegnacja-codzienna.pl',
    apiUrl: 'https://pielegnacja-codzienna.pl/wp-json/',
    username: 'editor',
    apiToken: 'test-secret',
    language: 'pl',
    socialAccounts: [],
    active: true,
    ...overrides,
  };
}

export function makeRule(overrides: Partial<AutomationRule> = {}): AutomationRule {
  return {
    id: 'rule-1',
    name: 'Daily skincare',
    blogId: 'blog-1',
    categories: ['Kosmetyki'],
    autoPublish: true,
    autoSocialPost: false,
    autoApproveTopics: true,
    dailyQuota: 1,
    active: true,
    ...overrides,
  };
}

export function makeTopic(overrides: Partial<Topic> = {}): Topic {
  return {
    id: 'topic-1',
    blogId: 'blog-1',
    title: 'Jak dobrać krem do cery suchej',
    category: 'Kosmetyki',
    priority: 5,
    status: 'approved',
    createdAt: '2024-05-01T08:00:00.000Z',
    used: false,
    ...overrides,
  };
}
