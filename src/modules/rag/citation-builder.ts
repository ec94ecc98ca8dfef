import type { Citation, Document } from "./types.js";

const SNIPPET_LENGTH = 200;

export const buildSnippet = (content: string): string =>
  content.length > SNIPPET_LENGTH ? `${content.slice(0, SNIPPET_LENGTH)}...` : content;

export const buildCitations = (documents: readonly Pick<Document, "title" | "url" | "content">[]): Citation[] =>
  documents.map((document) => ({
    title: document.title,
    url: document.url,
    content: document.content,
    snippet: buildSnippet(document.content)
  }));
