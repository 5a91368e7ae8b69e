/**
 * Fallback career titles per major, used when no upstream producer supplies them
 */

const CAREERS_BY_MAJOR: ReadonlyMap<string, readonly string[]> = new Map([
  ['Computer Science', ['Software Engineer', 'Data Scientist', 'DevOps Engineer', 'Product Manager']],
  ['Business Administration', ['Marketing Manager', 'Financial Analyst', 'Management Consultant', 'Operations Manager']],
  ['Psychology', ['Clinical Psychologist', 'HR Manager', 'UX Researcher', 'Counselor']],
  ['Mechanical Engineering', ['Mechanical Engineer', 'Robotics Engineer', 'Manufacturing Engineer', 'Project Manager']],
]);

export function careerTitlesForMajor(major: string): string[] {
  const known = CAREERS_BY_MAJOR.get(major);
  if (known) {
    return [...known];
  }
  return [`${major} Specialist`, `Senior ${major} Professional`, `${major} Manager`];
}

export function careerId(title: string): string {
  return title.toLowerCase().replaceAll(' ', '_');
}
