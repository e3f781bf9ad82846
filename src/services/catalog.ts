/**
 * Course Catalog
 * Course and lesson material the search and outline tools read from.
 * Loaded once at startup from a JSON file.
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import { logger } from '../logger.js';
import { AppError, errorMessage } from '../utils/errors.js';

const log = logger.child({ module: 'catalog' });

const SNIPPET_CHARS = 600;
const DEFAULT_SEARCH_LIMIT = 5;

const LessonSchema = z.object({
  number: z.number().int().nonnegative(),
  title: z.string().min(1),
  link: z.string().optional(),
  content: z.string(),
});

const CourseSchema = z.object({
  title: z.string().min(1),
  link: z.string().optional(),
  instructor: z.string().optional(),
  lessons: z.array(LessonSchema).default([]),
});

const CatalogFileSchema = z.object({
  courses: z.array(CourseSchema),
});

export type Lesson = z.infer<typeof LessonSchema>;
export type Course = z.infer<typeof CourseSchema>;

export interface SearchOptions {
  courseName?: string;
  lessonNumber?: number;
  limit?: number;
}

export interface SearchHit {
  courseTitle: string;
  lessonNumber: number;
  lessonTitle: string;
  lessonLink?: string;
  snippet: string;
  score: number;
}

/** Lower-cased words of three or more characters. */
export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^a-z0-9]+/)
    .filter(word => word.length >= 3);
}

function toSnippet(content: string): string {
  const trimmed = content.trim();
  if (trimmed.length <= SNIPPET_CHARS) return trimmed;
  return `${trimmed.slice(0, SNIPPET_CHARS).trimEnd()}...`;
}

export class CourseCatalog {
  private courses: Course[];

  constructor(courses: Course[] = []) {
    this.courses = courses;
  }

  static fromJson(json: unknown): CourseCatalog {
    const parsed = CatalogFileSchema.safeParse(json);
    if (!parsed.success) {
      throw AppError.internal('Invalid course catalog', parsed.error.flatten());
    }
    return new CourseCatalog(parsed.data.courses);
  }

  listCourses(): Course[] {
    return [...this.courses];
  }

  get size(): number {
    return this.courses.length;
  }

  /**
   * Exact title match first (case-insensitive), then the first title that
   * contains the given name.
   */
  resolveCourse(name: string): Course | undefined {
    const needle = name.trim().toLowerCase();
    if (!needle) return undefined;

    const exact = this.courses.find(c => c.title.toLowerCase() === needle);
    if (exact) return exact;

    return this.courses.find(c => c.title.toLowerCase().includes(needle));
  }

  search(query: string, options: SearchOptions = {}): SearchHit[] {
    const terms = Array.from(new Set(tokenize(query)));
    if (terms.length === 0) return [];

    let courses = this.courses;
    if (options.courseName !== undefined) {
      const course = this.resolveCourse(options.courseName);
      courses = course ? [course] : [];
    }

    const hits: SearchHit[] = [];
    for (const course of courses) {
      for (const lesson of course.lessons) {
        if (options.lessonNumber !== undefined && lesson.number !== options.lessonNumber) {
          continue;
        }

        const words = new Set(tokenize(`${lesson.title} ${lesson.content}`));
        const score = terms.filter(term => words.has(term)).length;
        if (score === 0) continue;

        hits.push({
          courseTitle: course.title,
          lessonNumber: lesson.number,
          lessonTitle: lesson.title,
          ...(lesson.link ? { lessonLink: lesson.link } : {}),
          snippet: toSnippet(lesson.content),
          score,
        });
      }
    }

    // Array.prototype.sort is stable, so ties keep catalog order.
    hits.sort((a, b) => b.score - a.score);
    return hits.slice(0, options.limit ?? DEFAULT_SEARCH_LIMIT);
  }
}

export async function loadCourseCatalog(path: string): Promise<CourseCatalog> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      log.warn({ path }, 'course catalog not found, starting with an empty catalog');
      return new CourseCatalog();
    }
    throw error;
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw AppError.internal(`Course catalog at ${path} is not valid JSON`, {
      cause: errorMessage(error),
    });
  }

  const catalog = CourseCatalog.fromJson(json);
  log.info({ path, courses: catalog.size }, 'course catalog loaded');
  return catalog;
}
