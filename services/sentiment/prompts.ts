import type { SentimentScope } from '../../types.ts';

export const COMPANY_SENTIMENT_RUBRIC = `
Score the news on this scale, from the point of view of a shareholder of the company:
-5: catastrophic news (fraud, bankruptcy risk, collapse of the core business)
-3 to -4: clearly negative news (earnings miss, guidance cut, major lawsuit, executive departure under pressure)
-1 to -2: mildly negative news (small setbacks, cautious analyst notes, minor delays)
0: neutral or purely informational news
+1 to +2: mildly positive news (small wins, favourable analyst notes, minor product launches)
+3 to +4: clearly positive news (earnings beat, raised guidance, major contract or approval)
+5: exceptional news (transformational deal, breakthrough product, record results far above expectations)
`.trim();

export const SECTOR_SENTIMENT_RUBRIC = `
Score the news on this scale, from the point of view of an investor in the whole sector:
-5: sector-wide crisis (collapse in demand, sweeping adverse regulation)
-3 to -4: clearly negative sector news (falling demand, rising costs, regulatory pressure)
-1 to -2: mildly negative sector news (soft data, cautious outlooks)
0: neutral or mixed sector news
+1 to +2: mildly positive sector news (stabilising demand, supportive data)
+3 to +4: clearly positive sector news (strong demand, favourable policy, rising margins)
+5: exceptional sector tailwind (structural boom, landmark policy support)
`.trim();

export const rubricFor = (scope: SentimentScope) =>
  scope === 'company' ? COMPANY_SENTIMENT_RUBRIC : SECTOR_SENTIMENT_RUBRIC;

export const SUMMARY_SYSTEM_PROMPT =
  'You are a financial news analyst. You write short, factual summaries of news articles for equity investors.';

export const buildSummaryPrompt = (title: string, content: string) => `
Summarize the following news article in 5 to 6 sentences.
Keep only facts stated in the article: figures, events, guidance and quotes.
Do not speculate and do not add opinions that are not in the article.

Title: ${title}

Article:
${content}
`.trim();

export const buildArticleScorePrompt = (scope: SentimentScope, target: string, title: string, text: string) => `
TASK: Rate the sentiment of this news article for the ${scope === 'company' ? 'company' : 'sector'} "${target}".

${rubricFor(scope)}

Title: ${title}
Text:
${text}

SCHEMA:
{ "score": integer from -5 to 5, "label": "short sentiment label" }
`.trim();

export interface AggregateItem {
  title: string;
  text: string;
  score: number | null;
}

const renderItems = (items: AggregateItem[]) =>
  items
    .map((item, i) => {
      const score = item.score == null ? 'unscored' : `score ${item.score > 0 ? '+' : ''}${item.score}`;
      return `${i + 1}. ${item.title} (${score})\n${item.text}`;
    })
    .join('\n\n');

export const buildAggregatePrompt = (scope: SentimentScope, target: string, items: AggregateItem[]) => `
TASK: Consolidate the news below into one overall sentiment for the ${scope === 'company' ? 'company' : 'sector'} "${target}".
Weigh recent, material news more than routine items. Write a statement of 3 to 5 sentences that names the main drivers.

${rubricFor(scope)}

NEWS:
${renderItems(items)}

SCHEMA:
{ "score": integer from -5 to 5, "label": "short sentiment label", "statement": "consolidated sentiment statement" }
`.trim();
