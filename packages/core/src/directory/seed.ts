import type { Activity } from '../types/activity.js';

/**
 * Activities the directory starts with when no seed file is configured.
 */
export const DEFAULT_ACTIVITIES: readonly Activity[] = [
  {
    name: 'Chess Club',
    description: 'Learn strategies and compete in chess tournaments',
    schedule: 'Fridays, 3:30 PM - 5:00 PM',
    maxParticipants: 12,
    participants: ['michael@mergington.edu', 'daniel@mergington.edu'],
  },
  {
    name: 'Programming Class',
    description: 'Learn programming fundamentals and build software projects',
    schedule: 'Tuesdays and Thursdays, 3:30 PM - 4:30 PM',
    maxParticipants: 20,
    participants: ['emma@mergington.edu', 'sophia@mergington.edu'],
  },
  {
    name: 'Gym Class',
    description: 'Physical education and sports activities',
    schedule: 'Mondays, Wednesdays, Fridays, 2:00 PM - 3:00 PM',
    maxParticipants: 30,
    participants: ['john@mergington.edu', 'olivia@mergington.edu'],
  },
  // Sports
  {
    name: 'Soccer Team',
    description: 'Practice soccer skills and compete with other schools',
    schedule: 'Tuesdays, 4:00 PM - 5:30 PM',
    maxParticipants: 18,
    participants: [],
  },
  {
    name: 'Basketball Team',
    description: 'Train and play competitive basketball games',
    schedule: 'Thursdays, 4:00 PM - 5:30 PM',
    maxParticipants: 15,
    participants: [],
  },
  // Artistic
  {
    name: 'Art Club',
    description: 'Create paintings, drawings, and digital art',
    schedule: 'Wednesdays, 3:30 PM - 5:00 PM',
    maxParticipants: 16,
    participants: [],
  },
  {
    name: 'Drama Club',
    description: 'Acting, improvisation, and stage performances',
    schedule: 'Mondays, 4:00 PM - 5:30 PM',
    maxParticipants: 14,
    participants: [],
  },
  // Intellectual
  {
    name: 'Math Club',
    description: 'Solve challenging math problems and puzzles',
    schedule: 'Fridays, 2:30 PM - 3:30 PM',
    maxParticipants: 12,
    participants: [],
  },
  {
    name: 'Robotics Club',
    description: 'Build and program robots',
    schedule: 'Thursdays, 3:30 PM - 5:00 PM',
    maxParticipants: 12,
    participants: [],
  },
];
