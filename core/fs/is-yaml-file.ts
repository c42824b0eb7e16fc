/**
 * Checks if a file is a YAML file.
 *
 * @param filePath - The path to the file.
 * @returns True for `.yml` and `.yaml` files, in any letter case.
 */
export function isYamlFile(filePath: string): boolean {
  let lower = filePath.toLowerCase()
  return lower.endsWith('.yml') || lower.endsWith('.yaml')
}
