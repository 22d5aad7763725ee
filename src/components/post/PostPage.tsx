import type { ReactNode } from "react";
import type { RenderedPost } from "../../lib/render";
import { postStyles } from "../../styles/form-styles";
import { PostHeader } from "./PostHeader";

export interface PostPageProps {
  post: RenderedPost;
  /** Live examples shown after the article body, e.g. the sign-up form. */
  children?: ReactNode;
}

/**
 * PostPage - one article: metadata header, then the body HTML produced by
 * `renderPost`. The HTML has already been through rehype-sanitize, which is
 * what makes `dangerouslySetInnerHTML` acceptable here.
 */
export function PostPage({ post, children }: PostPageProps) {
  return (
    <article className={postStyles.article} data-testid="post-page">
      <PostHeader frontmatter={post.frontmatter} />
      <div
        className={postStyles.body}
        data-testid="post-body"
        dangerouslySetInnerHTML={{ __html: post.html }}
      />
      {children && <section className="mt-10">{children}</section>}
    </article>
  );
}

export default PostPage;
