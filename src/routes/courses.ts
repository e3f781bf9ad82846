import type { FastifyPluginAsync } from 'fastify';
import type { CourseCatalog } from '../services/catalog.js';

export interface CourseRouteOptions {
  catalog: CourseCatalog;
}

export const courseRoutes: FastifyPluginAsync<CourseRouteOptions> = async (server, options) => {
  // GET /v1/courses - Catalog overview
  server.get('/courses', async () => {
    const courses = options.catalog.listCourses();
    return {
      total: courses.length,
      courses: courses.map(course => ({
        title: course.title,
        instructor: course.instructor ?? null,
        lessons: course.lessons.length,
      })),
    };
  });
};
