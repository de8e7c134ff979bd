import type { PullRequestBody } from "../types/pull-request.js";

function bulletList(items: readonly string[] | undefined): string | null {
  const kept = (items ?? []).map((item) => item.trim()).filter((item) => item.length > 0);
  return kept.length > 0 ? kept.map((item) => `- ${item}`).join("\n") : null;
}

function section(title: string, content: string | null | undefined): string | null {
  const text = content?.trim();
  return text ? `## ${title}\n\n${text}` : null;
}

/**
 * Render the fixed pull request template. Empty sections are left out;
 * the footer always closes the body.
 */
export function renderPullRequestBody(body: PullRequestBody | string, footer: string): string {
  const structured: PullRequestBody = typeof body === "string" ? { summary: body } : body;

  const sections = [
    section("Summary", structured.summary),
    section("Coverage", structured.coverage_delta),
    section("Classes improved", bulletList(structured.classes_improved)),
    section("Bugs found", bulletList(structured.bugs_found)),
    section("Next steps", structured.next_steps),
  ].filter((s): s is string => s !== null);

  const trimmedFooter = footer.trim();
  if (trimmedFooter) sections.push(`---\n${trimmedFooter}`);
  return sections.join("\n\n");
}
