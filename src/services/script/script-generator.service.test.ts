import { describe, it, expect } from 'vitest';
import { ScriptGeneratorService } from './script-generator.service';
import { resolveVideoConfig } from '../../types/pipeline.types';
import { FakeStructuredGenerator } from '../../test/fake-llm';

const config = resolveVideoConfig({ topic: 'Tide pools', modelProvider: 'anthropic' });

describe('ScriptGeneratorService', () => {
  it('sends the goal and hook into the script call', async () => {
    const llm = new FakeStructuredGenerator({ Script: [{ script: 'Tide pools hide whole worlds.' }] });
    const script = await new ScriptGeneratorService(llm).generateScript(config, 'Spark curiosity', 'Look closer.');

    expect(script).toBe('Tide pools hide whole worlds.');
    const [call] = llm.callsFor('Script');
    expect(call.provider).toBe('anthropic');
    expect(call.payload).toMatchObject({ topic: 'Tide pools', goal: 'Spark curiosity', hook: 'Look closer.' });
  });

  it('falls back to the raw text for a segment without an enhanced track', async () => {
    const llm = new FakeStructuredGenerator({
      ScriptList: [
        {
          scriptList: [
            { scriptSegment: 'First part.', enhancedScriptSegment: '[softly] First part.' },
            { scriptSegment: 'Second part.', enhancedScriptSegment: '' },
          ],
        },
      ],
    });

    const segments = await new ScriptGeneratorService(llm).segmentScript('raw', 'enhanced', 'google');

    expect(segments).toEqual([
      { scriptSegment: 'First part.', enhancedScriptSegment: '[softly] First part.' },
      { scriptSegment: 'Second part.', enhancedScriptSegment: 'Second part.' },
    ]);
  });

  it('drops blank segments', async () => {
    const llm = new FakeStructuredGenerator({
      ScriptList: [
        {
          scriptList: [
            { scriptSegment: 'First part.', enhancedScriptSegment: '' },
            { scriptSegment: '  ', enhancedScriptSegment: '[pause]' },
            { scriptSegment: 'Second part.', enhancedScriptSegment: ' ' },
          ],
        },
      ],
      SectionSegments: [{ segments: ['One.', '', ' ', 'Two.'] }],
    });
    const scripts = new ScriptGeneratorService(llm);

    expect(await scripts.segmentScript('raw', 'enhanced', 'google')).toEqual([
      { scriptSegment: 'First part.', enhancedScriptSegment: 'First part.' },
      { scriptSegment: 'Second part.', enhancedScriptSegment: 'Second part.' },
    ]);
    expect(await scripts.segmentSectionScript('One. Two.', 'google')).toEqual(['One.', 'Two.']);
  });

  it('pads a short list of image descriptions with the last one', async () => {
    const llm = new FakeStructuredGenerator({
      SegmentImageDescriptions: [
        {
          segmentImageDescriptions: [
            { description: 'wet rocks at dawn', usesLogo: false },
            { description: 'a starfish close-up', usesLogo: false },
          ],
        },
      ],
    });

    const descriptions = await new ScriptGeneratorService(llm).generateImageDescriptions(config, {
      scriptSegment: 'Look under the rocks.',
      fullScript: 'Look under the rocks.',
      numImages: 3,
    });

    expect(descriptions.map((d) => d.description)).toEqual([
      'wet rocks at dawn',
      'a starfish close-up',
      'a starfish close-up',
    ]);
    expect(llm.callsFor('SegmentImageDescriptions')[0].payload).toMatchObject({ numOfImageDescriptions: 3 });
  });

  it('drops extra image descriptions', async () => {
    const llm = new FakeStructuredGenerator({
      SegmentImageDescriptions: [
        {
          segmentImageDescriptions: [
            { description: 'one', usesLogo: false },
            { description: 'two', usesLogo: false },
          ],
        },
      ],
    });

    const descriptions = await new ScriptGeneratorService(llm).generateImageDescriptions(config, {
      scriptSegment: 's',
      fullScript: 's',
      numImages: 1,
    });

    expect(descriptions.map((d) => d.description)).toEqual(['one']);
  });
});
