/**
 * Summary prompt: formatting rules, fixed section order, content rules and the
 * metric directionality rules, followed by the compact JSON.
 */

export const DIRECTIONALITY_RULES =
  `Metric interpretation rules:\n` +
  `- Time measures in minutes: lower is better.\n` +
  `- Compliance measures in percent: higher is better.\n` +
  `- Infection SIR: lower is better.\n` +
  `- Mortality/complication rates: lower is better.\n` +
  `- ED volume categories (if present) are context only, not good/bad.\n` +
  `- Only make 'compared to national' statements when the data explicitly includes a comparison label.\n`;

export const SECTION_TITLES = [
  "Overall Performance Snapshot",
  "Key Strengths",
  "Priority Concerns",
  "Key Interconnections",
  "Prioritized Actions",
] as const;

export function buildSummaryPrompt(facility: string, compactJson: string): string {
  return `
You are a hospital quality and performance analyst writing for executive leadership.

Using only the provided JSON performance data for the facility: ${facility},
produce a one-screen, executive-ready performance summary suitable for display
inside an analytics dashboard.

Formatting rules (important):
- Do NOT use Markdown.
- Do NOT use hashtags (#), asterisks (*), or bullet symbols.
- Use plain text only.
- Separate sections using line breaks.
- Use short section titles followed by paragraphs or hyphen-free sentences.

Structure the output exactly as follows:

AI-Assisted Performance Summary
Facility Name

${SECTION_TITLES[0]}
(2-3 concise sentences summarizing overall performance using only what the data supports)

${SECTION_TITLES[1]}
(2-3 short sentences highlighting the strongest areas supported by the data)

${SECTION_TITLES[2]}
(3-4 short sentences identifying underperforming or high-risk areas supported by the data)

${SECTION_TITLES[3]}
(1-2 sentences linking related patterns WITHOUT implying causality)

${SECTION_TITLES[4]}
(2-3 concise, process-focused recommendations directly tied to the weakest metrics)

Content rules:
- Base all insights strictly on the provided metrics.
- Avoid causal claims; describe patterns only.
- Do not introduce new programs, technologies, staffing assumptions, or speculative causes.
- Do not reference internal variable names.
- Do not use measure IDs; use the provided metric names when available.
- Prioritize insights in proportion to dashboard prominence: ED flow and access, sepsis timeliness, readmissions, and patient experience.
- Keep the tone neutral and executive-friendly.
- Do not exceed 200-250 words.

${DIRECTIONALITY_RULES}

JSON:
${compactJson}
`.trim();
}
