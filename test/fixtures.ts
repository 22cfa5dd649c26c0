import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

export const SMITH_BIB = [
  '@article{smith2020,',
  '  author = {John Smith and Jane Doe},',
  '  title = {A Study},',
  '  journal = {Journal of X},',
  '  year = {2020},',
  '  volume = {5},',
  '  number = {2},',
  '  pages = {10--20}',
  '}',
  '',
].join('\n');

export const SMITH_REFERENCE =
  '**[1]** Smith, J., Doe, J. (2020). A Study. *Journal of X*. 5(2), pp. 10–20';

export const AB_BIB = [
  '@article{a,',
  '  author = {Alice Adams},',
  '  title = {Alpha},',
  '  year = {2001},',
  '}',
  '',
  '@book{b,',
  '  author = {Bob Brown},',
  '  title = {Beta},',
  '  year = {2002},',
  '}',
  '',
].join('\n');

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'cite-md-test-'));
}

export function writeTempFile(name: string, content: string): string {
  const filePath = path.join(makeTempDir(), name);
  fs.writeFileSync(filePath, content, 'utf8');
  return filePath;
}

export function collectWarnings() {
  const warnings: string[] = [];
  return { warnings, warn: (message: string) => warnings.push(message) };
}
