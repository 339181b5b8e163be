/**
 * Author list parsing.
 *
 * `"Ada <ada@example.com>, Bob"` → authors `["Ada <ada@example.com>", "Bob"]`,
 * names `["Ada", "Bob"]`, joined `"Ada, Bob"`.
 *
 * @module
 */

export interface AuthorList {
    /** Trimmed, non-empty entries as given */
    readonly authors: readonly string[];
    /** Entries with any trailing ` <email>` removed */
    readonly names: readonly string[];
    /** `names` joined with `, ` */
    readonly joinedNames: string;
}

const NAME_EMAIL = /^(.+) <.+>/s;

/** `'My Name <my@email>'` → `'My Name'`; anything else passes through. */
export function displayName(author: string): string {
    const name = NAME_EMAIL.exec(author)?.[1];
    return name !== undefined ? name.trim() : author;
}

export function parseAuthors(raw: string): AuthorList {
    const authors = raw.split(',').map(a => a.trim()).filter(a => a !== '');
    const names = authors.map(displayName);
    return { authors, names, joinedNames: names.join(', ') };
}
