import { CalendarDays, Tag } from "lucide-react";
import type { PostFrontmatter } from "../../lib/frontmatter";
import { postStyles } from "../../styles/form-styles";

/**
 * "2024-03-12" -> "March 12, 2024". Formatted in UTC so the day never shifts
 * with the reader's time zone.
 */
export function formatPostDate(isoDay: string): string {
  return new Intl.DateTimeFormat("en-US", {
    year: "numeric",
    month: "long",
    day: "numeric",
    timeZone: "UTC",
  }).format(new Date(`${isoDay}T00:00:00Z`));
}

export interface PostHeaderProps {
  frontmatter: PostFrontmatter;
}

export function PostHeader({ frontmatter }: PostHeaderProps) {
  return (
    <header className={postStyles.header} data-testid="post-header">
      <h1 className={postStyles.title}>{frontmatter.title}</h1>
      <p className={postStyles.desc}>{frontmatter.desc}</p>
      <div className={postStyles.meta}>
        <span className="inline-flex items-center gap-1">
          <CalendarDays size={14} aria-hidden="true" />
          <time dateTime={frontmatter.date}>{formatPostDate(frontmatter.date)}</time>
        </span>
        <ul className="flex flex-wrap gap-2" aria-label="Tags">
          {frontmatter.tags.map((tag) => (
            <li key={tag} className={postStyles.tag}>
              <Tag size={12} aria-hidden="true" />
              {tag}
            </li>
          ))}
        </ul>
      </div>
    </header>
  );
}
