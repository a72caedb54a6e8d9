/**
 * Templates
 *
 * Render mustache templates shipped in the resources directory.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as Mustache from 'mustache';

export const RESOURCES_DIR = path.join(__dirname, '../../resources');

export function resourcePath(...segments: string[]): string {
  return path.join(RESOURCES_DIR, ...segments);
}

/**
 * Render resources/<relativePath> with the given view
 */
export function renderTemplate(relativePath: string, view: object): string {
  const template = fs.readFileSync(resourcePath(relativePath), 'utf8');
  return Mustache.render(template, view);
}
