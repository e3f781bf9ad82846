import type { Course } from '../catalog.js';

export const sampleCourses: Course[] = [
  {
    title: 'Intro to Testing',
    link: 'https://example.com/testing',
    instructor: 'Ada',
    lessons: [
      { number: 0, title: 'Welcome', content: 'Why automated tests matter.' },
      { number: 1, title: 'Unit Tests', content: 'Unit tests check one function in isolation.' },
      { number: 2, title: 'Mocks', content: 'Mocks replace collaborators in unit tests.' },
    ],
  },
  {
    title: 'Advanced Testing Patterns',
    lessons: [
      { number: 1, title: 'Property Tests', content: 'Property tests generate many inputs.' },
    ],
  },
];
