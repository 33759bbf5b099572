/** First three characters (code points) of the project name, upper-cased. */
export function taskCodePrefix(projectName: string): string {
  return Array.from(projectName).slice(0, 3).join('').toUpperCase();
}

export function formatTaskCode(projectName: string, sequence: number): string {
  return `${taskCodePrefix(projectName)}-${sequence}`;
}
