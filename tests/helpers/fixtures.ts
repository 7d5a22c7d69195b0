import { readFileSync } from 'fs';
import path from 'path';

export function loadFixture(name: string): string {
  return readFileSync(path.join(__dirname, '..', 'fixtures', name), 'utf-8');
}
