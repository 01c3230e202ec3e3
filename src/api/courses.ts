/**
 * Course catalog endpoints.
 * GET /api/courses: number of loaded courses and their titles.
 */

import { pipeline, type Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { CourseStatsResponse } from '../types/api.js';

export function createCourseHandlers(container: Container) {
  const stats: Handler = pipeline(container.logging, container.errors)(async () => {
    const analytics = await container.assistantService.analytics();

    const body: CourseStatsResponse = {
      total_courses: analytics.totalCourses,
      course_titles: analytics.courseTitles,
    };
    return new Response(JSON.stringify(body), {
      status: 200,
      headers: {
        'Content-Type': 'application/json',
        'Cache-Control': 'public, max-age=60',
      },
    });
  });

  return { stats };
}
