/**
 * normalize-links.ts - Rewrites entity links in a text or markdown file to canonical form
 *
 * Chat clients post links with fallback display text, e.g.
 *   <#E/user/user1|[@User One](http://localhost:8585/user/user1)>
 * This script reduces every link to <#E/user/user1> and drops empty trailing segments.
 *
 * Usage: npm run normalize -- <filename>
 * Output: Overwrites the file, saves original as <filename>.old
 */

import fs from 'fs-extra';
import { canonicalizeLinks } from '../src/codec.js';

async function main(): Promise<void> {
    const args = process.argv.slice(2);

    if (args.length !== 1) {
        console.error('Usage: npm run normalize -- <filename>');
        process.exit(1);
    }

    const inputFile = args[0];

    if (!(await fs.pathExists(inputFile))) {
        console.error(`File not found: ${inputFile}`);
        process.exit(1);
    }

    const originalContent = await fs.readFile(inputFile, 'utf-8');
    const { text, replaced } = canonicalizeLinks(originalContent);

    if (replaced === 0) {
        console.log(`No links to rewrite in ${inputFile}`);
        return;
    }

    const oldFile = `${inputFile}.old`;
    await fs.move(inputFile, oldFile, { overwrite: true });
    console.log(`Original saved as: ${oldFile}`);

    await fs.writeFile(inputFile, text, 'utf-8');
    console.log(`Rewrote ${replaced} entity link(s) in ${inputFile}`);
}

main().catch(err => {
    console.error(err instanceof Error ? err.message : err);
    process.exit(1);
});
