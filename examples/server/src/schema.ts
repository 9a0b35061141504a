/**
 * Example schema: a small in-memory book catalog.
 */

import { buildSchema } from "graphql";
import type { UploadedFile } from "@gqlserve/handler";

export interface Book {
  readonly id: string;
  readonly title: string;
  readonly author: string;
}

/**
 * Root value built per request from the resolved options.
 */
export interface RootValue {
  books(): ReadonlyArray<Book>;
  book(args: { id: string }): Book | null;
  addBook(args: { title: string; author: string }): Book;
  uploadedFiles(): Promise<ReadonlyArray<{ field: string; name: string; size: number }>>;
}

export const schema = buildSchema(`
  type Book {
    id: ID!
    title: String!
    author: String!
  }

  type UploadedFile {
    field: String!
    name: String!
    size: Int!
  }

  type Query {
    books: [Book!]!
    book(id: ID!): Book
    uploadedFiles: [UploadedFile!]!
  }

  type Mutation {
    addBook(title: String!, author: String!): Book!
  }
`);

export function createCatalog(): Book[] {
  return [
    { id: "1", title: "The Left Hand of Darkness", author: "Ursula K. Le Guin" },
    { id: "2", title: "Kindred", author: "Octavia E. Butler" },
  ];
}

export function createRootValue(
  catalog: Book[],
  files: Readonly<Record<string, ReadonlyArray<UploadedFile>>>
): RootValue {
  return {
    books: () => catalog,
    book: ({ id }) => catalog.find((book) => book.id === id) ?? null,
    addBook: ({ title, author }) => {
      const book = { id: String(catalog.length + 1), title, author };
      catalog.push(book);
      return book;
    },
    uploadedFiles: async () =>
      Object.entries(files).flatMap(([field, parts]) =>
        parts.map((file) => ({ field, name: file.name, size: file.size }))
      ),
  };
}
