export { PostPage, type PostPageProps } from "./PostPage";
export { PostHeader, formatPostDate, type PostHeaderProps } from "./PostHeader";
