import { describe, it, expect, beforeEach } from 'vitest';
import { PromptService } from '../../src/services/PromptService.js';
import { NotFoundError, ProviderUnavailableError, ValidationError } from '../../src/errors.js';
import { DEFAULT_REPLIES } from '../mocks/MockModelProvider.js';
import { agentRow, createTestBed, type TestBed } from '../mocks/fixtures.js';

describe('PromptService', () => {
  let bed: TestBed;
  let service: PromptService;

  beforeEach(async () => {
    bed = createTestBed();
    service = new PromptService(bed.agentRepo, bed.providers, bed.logProvider);
    await bed.agentRepo.insert(agentRow());
  });

  describe('validatePrompt', () => {
    it('should return the model verdict', async () => {
      bed.groq.reply(
        'validation',
        'Here you go: {"is_valid": true, "confidence": 1.4, "issues": [], "suggestions": ["Mention the database"]}'
      );

      const result = await service.validatePrompt('A web app for booking tennis courts', 'agent-1');

      expect(result).toEqual({
        isValid: true,
        confidenceScore: 1,
        issues: [],
        suggestions: ['Mention the database'],
      });
    });

    it('should mark short prompts invalid without calling the model', async () => {
      const result = await service.validatePrompt('app', 'agent-1');

      expect(result.isValid).toBe(false);
      expect(result.confidenceScore).toBe(0);
      expect(bed.groq.calls).toHaveLength(0);
    });

    it('should fall back to a neutral verdict on an unreadable reply', async () => {
      bed.groq.reply('validation', 'I think it is fine');

      const result = await service.validatePrompt('A web app for booking tennis courts', 'agent-1');

      expect(result).toEqual({
        isValid: false,
        confidenceScore: 0.5,
        issues: ['Could not interpret the validation response'],
        suggestions: ['Rephrase the prompt with more detail about the project'],
      });
    });

    it('should work on a busy agent', async () => {
      await bed.agentRepo.update('agent-1', { status: 'busy' });
      const result = await service.validatePrompt('A web app for booking tennis courts', 'agent-1');
      expect(result.isValid).toBe(true);
    });

    it('should throw NotFoundError for an unknown agent', async () => {
      await expect(service.validatePrompt('A web app for booking', 'missing')).rejects.toThrow(NotFoundError);
    });
  });

  describe('extractMetadata', () => {
    it('should return normalized metadata', async () => {
      bed.groq.reply(
        'metadata',
        '```json\n{"project_name": "CourtBook", "description": "Court booking", "project_type": "web_app", ' +
          '"technologies": ["Vue", " Vue ", "Go"], "complexity_level": "Complex"}\n```'
      );

      const metadata = await service.extractMetadata('A web app for booking tennis courts', 'agent-1');

      expect(metadata).toEqual({
        projectName: 'CourtBook',
        description: 'Court booking',
        projectType: 'web_app',
        technologies: ['Vue', 'Go'],
        complexityLevel: 'high',
        estimatedDuration: 'unspecified',
      });
    });

    it('should reject a blank prompt', async () => {
      await expect(service.extractMetadata(' ', 'agent-1')).rejects.toThrow(ValidationError);
    });

    it('should fail when the reply lacks required fields', async () => {
      bed.groq.reply('metadata', '{"project_name": "CourtBook"}');
      await expect(service.extractMetadata('A web app for booking', 'agent-1')).rejects.toThrow(
        ProviderUnavailableError
      );
    });
  });

  describe('improvePrompt', () => {
    it('should validate first and pass the findings to the improvement', async () => {
      bed.groq.reply(
        'validation',
        '{"is_valid": false, "confidence": 0.2, "issues": ["No platform named"], "suggestions": ["Say web or mobile"]}'
      );

      const result = await service.improvePrompt('Booking thing for courts', 'agent-1');

      expect(result.originalPrompt).toBe('Booking thing for courts');
      expect(result.improvedPrompt).toBe(DEFAULT_REPLIES.improvement);
      expect(result.validation.issues).toEqual(['No platform named']);
      expect(bed.groq.callsFor('improvement')[0].user).toBe(
        'Rewrite the following documentation request so it is clearer and more complete.\n\n' +
          'PROMPT: Booking thing for courts\n\n' +
          'Problems: No platform named\n\n' +
          'Suggestions: Say web or mobile'
      );
    });

    it('should keep the original prompt when the model returns nothing', async () => {
      bed.groq.reply('improvement', '  ');
      const result = await service.improvePrompt('Booking thing for courts', 'agent-1');
      expect(result.improvedPrompt).toBe('Booking thing for courts');
    });

    it('should reject a blank prompt', async () => {
      await expect(service.improvePrompt('', 'agent-1')).rejects.toThrow('prompt is required');
    });
  });
});
