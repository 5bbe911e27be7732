/**
 * Prompt templates shared by every provider.
 */

import { documentTypeLabel } from '../services/lifecycle.js';
import type { ProjectMetadata, ValidationResult } from '../types/models.js';
import type { GenerationInput, QualityInput } from './IModelProvider.js';

/** Characters of a document sent along for quality analysis. */
export const QUALITY_EXCERPT_LENGTH = 4000;

export const SYSTEM_PROMPTS = {
  validation:
    'You review requests for project documentation. Approve prompts that describe a buildable project, even if details are missing. Reply with JSON only.',
  metadata: 'You are a software project analyst. Reply with JSON only.',
  generation:
    'You are a technical writer. Produce clear, well-structured project documentation in Markdown.',
  quality: 'You review technical documentation for clarity, completeness and accuracy. Reply with JSON only.',
  improvement:
    'You rewrite documentation requests so they are specific and complete. Reply with the rewritten prompt only.',
} as const;

export function validationPrompt(prompt: string): string {
  return [
    'Decide whether the following prompt has enough information to generate project documentation.',
    'It should name the kind of application (web, mobile, API, CLI, ...) and its central purpose.',
    '',
    `PROMPT: ${prompt}`,
    '',
    'Reply with JSON of the form:',
    '{"is_valid": true, "confidence": 0.0, "issues": ["..."], "suggestions": ["..."]}',
  ].join('\n');
}

export function metadataPrompt(prompt: string): string {
  return [
    'Extract project metadata from the following prompt.',
    '',
    `PROMPT: ${prompt}`,
    '',
    'Reply with JSON of the form:',
    '{"project_name": "...", "description": "...", "project_type": "web_app | api | mobile_app | cli | library | other",',
    ' "technologies": ["..."], "complexity_level": "low | medium | high", "estimated_duration": "..."}',
  ].join('\n');
}

export function generationSystemPrompt(instructions: readonly string[]): string {
  if (instructions.length === 0) return SYSTEM_PROMPTS.generation;
  return [
    SYSTEM_PROMPTS.generation,
    '',
    'Agent instructions:',
    ...instructions.map((instruction) => `- ${instruction}`),
  ].join('\n');
}

export function generationPrompt(input: GenerationInput): string {
  return [
    `Write a ${documentTypeLabel(input.documentType)} document for the project below.`,
    '',
    input.prompt,
    '',
    'Project information:',
    ...metadataLines(input.metadata),
    '',
    'Use Markdown headings, organize the content in sections, include practical examples where useful.',
  ].join('\n');
}

export function qualityPrompt(document: QualityInput): string {
  const excerpt =
    document.content.length > QUALITY_EXCERPT_LENGTH
      ? `${document.content.slice(0, QUALITY_EXCERPT_LENGTH)}\n[truncated]`
      : document.content;

  return [
    'Rate the quality of this document from 0 to 10 (clarity, completeness, technical quality, usefulness).',
    '',
    `Title: ${document.title}`,
    `Type: ${documentTypeLabel(document.documentType)}`,
    '',
    excerpt,
    '',
    'Reply with JSON of the form: {"overall_score": 0.0, "issues": ["..."]}',
  ].join('\n');
}

export function improvementPrompt(original: string, validation?: ValidationResult): string {
  const lines = ['Rewrite the following documentation request so it is clearer and more complete.', '', `PROMPT: ${original}`];
  if (validation && validation.issues.length > 0) {
    lines.push('', `Problems: ${validation.issues.join('; ')}`);
  }
  if (validation && validation.suggestions.length > 0) {
    lines.push('', `Suggestions: ${validation.suggestions.join('; ')}`);
  }
  return lines.join('\n');
}

function metadataLines(metadata: ProjectMetadata): string[] {
  return [
    `- Name: ${metadata.projectName}`,
    `- Description: ${metadata.description}`,
    `- Type: ${metadata.projectType}`,
    `- Technologies: ${metadata.technologies.length > 0 ? metadata.technologies.join(', ') : 'to be decided'}`,
    `- Complexity: ${metadata.complexityLevel}`,
    `- Estimated duration: ${metadata.estimatedDuration}`,
  ];
}
