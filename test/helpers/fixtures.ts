// test/helpers/fixtures.ts
import { fileURLToPath } from 'node:url';

export function fixtureUrl(name: string): URL {
  return new URL(`../fixtures/${name}`, import.meta.url);
}

export function fixturePath(name: string): string {
  return fileURLToPath(fixtureUrl(name));
}

export const DICT_TREE = [
  'root',
  '├── id: int',
  '├── createdAt: str',
  '├── customer: dict',
  '│   ├── name: str',
  '│   ├── email: str',
  '│   └── address: dict',
  '│       ├── city: str',
  '│       └── zip: str',
  '├── items: list[dict]',
  '│   ├── sku: str',
  '│   ├── qty: int',
  '│   ├── price: float',
  '│   └── tags: list[str]',
  '└── notes: NoneType',
].join('\n');

export const LIST_TREE = [
  'root: list[dict]',
  '├── team_id: int',
  '├── team_name: str',
  '└── lineup: list[dict]',
  '    ├── player_id: int',
  '    ├── country: dict',
  '    │   └── code: str',
  '    └── captain: bool',
].join('\n');
