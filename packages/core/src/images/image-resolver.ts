import { promises as fs } from 'node:fs';
import * as path from 'node:path';
import type { ImageReference, ImageSyntax } from '@note-topics/types';
import { isNotFound } from '../utils/errors.js';

/** ![alt](path) */
const MARKDOWN_IMAGE_PATTERN = /!\[[^\]]*\]\(([^)]+)\)/g;
/** ![[path]] */
const WIKI_IMAGE_PATTERN = /!\[\[([^\]]+)\]\]/g;

export interface ImageResolverOptions {
  /** Vaultルート（参照はここからの相対パスとして解決する） */
  inputDir: string;
  /** 拡張子なしの参照に試す拡張子 */
  extensions: string[];
}

/** 本文中に現れた未解決の参照 */
export interface RawImageReference {
  target: string;
  syntax: ImageSyntax;
}

export interface ImageResolution {
  /** 解決できた参照（出現順、解決先パスで重複除去） */
  references: ImageReference[];
  /** 見つからなかった参照先 */
  unresolved: string[];
}

/**
 * セクション本文から画像参照を抽出し、実ファイルのパスに解決するクラス
 */
export class ImageResolver {
  private inputDir: string;
  private extensions: string[];

  constructor(options: ImageResolverOptions) {
    this.inputDir = path.resolve(options.inputDir);
    this.extensions = options.extensions;
  }

  /**
   * 画像参照を抽出（ファイルシステムには触れない）
   */
  extract(body: string): RawImageReference[] {
    const found: Array<RawImageReference & { index: number }> = [];

    for (const match of body.matchAll(MARKDOWN_IMAGE_PATTERN)) {
      const target = normalizeMarkdownTarget(match[1]);
      if (target) {
        found.push({ target, syntax: 'markdown', index: match.index ?? 0 });
      }
    }

    for (const match of body.matchAll(WIKI_IMAGE_PATTERN)) {
      const target = normalizeWikiTarget(match[1]);
      if (target) {
        found.push({ target, syntax: 'wiki', index: match.index ?? 0 });
      }
    }

    return found
      .sort((a, b) => a.index - b.index)
      .map(({ target, syntax }) => ({ target, syntax }));
  }

  /**
   * 画像参照を抽出して解決
   */
  async resolve(body: string): Promise<ImageResolution> {
    const references: ImageReference[] = [];
    const unresolved: string[] = [];
    const seen = new Set<string>();

    for (const raw of this.extract(body)) {
      const sourcePath = await this.findSource(raw.target);

      if (!sourcePath) {
        if (!unresolved.includes(raw.target)) {
          unresolved.push(raw.target);
        }
        continue;
      }

      if (seen.has(sourcePath)) {
        continue;
      }
      seen.add(sourcePath);
      references.push({ ...raw, sourcePath });
    }

    return { references, unresolved };
  }

  /**
   * 参照先の実ファイルを探す
   * 拡張子がない場合（Obsidianでよくある）は候補の拡張子を順に試す
   */
  private async findSource(target: string): Promise<string | null> {
    const base = path.join(this.inputDir, target);
    const candidates = [base];

    if (!path.extname(target)) {
      candidates.push(...this.extensions.map((ext) => `${base}${ext}`));
    }

    for (const candidate of candidates) {
      if (await isFile(candidate)) {
        return candidate;
      }
    }

    return null;
  }
}

async function isFile(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile();
  } catch (error) {
    if (isNotFound(error) || (error as NodeJS.ErrnoException).code === 'ENOTDIR') {
      return false;
    }
    throw error;
  }
}

/**
 * ![alt](path "title") の path 部分を正規化
 * 外部画像とdata URIは対象外（空文字列を返す）
 */
function normalizeMarkdownTarget(raw: string): string {
  let target = raw.trim();

  // <path with spaces>
  const angled = /^<([^>]*)>/.exec(target);
  if (angled) {
    target = angled[1];
  } else {
    // タイトル部分を除去
    target = target.replace(/\s+(["'])[^"']*\1$/, '');
  }

  if (target.includes('://') || target.startsWith('data:')) {
    return '';
  }

  // フラグメントとクエリを除去
  target = target.split('#')[0].split('?')[0];

  return decodeTarget(target).trim();
}

/**
 * ![[path|300]] / ![[path#anchor]] の path 部分を正規化
 */
function normalizeWikiTarget(raw: string): string {
  return raw.split('|')[0].split('#')[0].trim();
}

function decodeTarget(target: string): string {
  if (!target.includes('%')) {
    return target;
  }
  try {
    return decodeURIComponent(target);
  } catch {
    // 不正なエスケープはそのまま扱う
    return target;
  }
}
