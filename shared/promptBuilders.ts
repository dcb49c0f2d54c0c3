import { ART_STYLE, SLIDE_DELIMITER } from './constants';
import type { SlideTemplate } from './types';

export function buildSlideDeckSystemPrompt(): string {
  return `<role>
You are a creative tabletop RPG content writer producing short-form carousel slides.
You MUST follow the requested output template exactly.
</role>

<constraints>
1. Output only the slides. No introduction, explanations or closing remarks.
2. Keep every slide's text short enough to fit on a portrait phone screen.
3. Each visual description is ONE sentence and unique across the deck.
</constraints>`.trim();
}

function buildSlideTemplateSection(template: SlideTemplate): string {
  const itemLabel = template.itemLabel === 'Concept' ? 'Title' : template.itemLabel;
  return `<slide_template>
### **Slide [Number] – [${itemLabel}/Title Card]**
**visual:** (One sentence describing a unique retro-anime illustration for this slide. Avoid repeating the same character description across slides.)
**The slide should have this exact text (don't add any other text):**
**[${itemLabel}/Title] – [Catchy Item/Concept]**
*[Witty/Funny Subtitle]*

${SLIDE_DELIMITER}
</slide_template>`.trim();
}

export function buildSlideDeckUserPrompt(theme: string, template: SlideTemplate): string {
  const context = `<context>
  <theme>${theme}</theme>
  <total_slides>${template.expectedSlides}</total_slides>
  <structure>${template.guideline}</structure>
</context>`.trim();

  const task = `<task>
Generate a ${template.expectedSlides}-slide carousel series based on the theme.
For EACH slide, output exactly the <slide_template> below, including the markdown and phrasing,
and separate slides with a line containing only "${SLIDE_DELIMITER}".
</task>`.trim();

  return [context, task, buildSlideTemplateSection(template)].join('\n\n').trim();
}

/**
 * Image prompt for one slide variant. The display text is quoted verbatim and
 * must be rendered centered; the theme itself must not appear as text.
 */
export function buildSlideImagePrompt(theme: string, visual: string, displayText: string): string {
  return `I am making a slide for a carousel series where the theme is "${theme}".
Make a 9:16 portrait slide in the following style:
${ART_STYLE}
Rules:
1) Do not include the theme as text.
2) Keep it fantasy tabletop, not futuristic.
3) Render the slide text below EXACTLY as written, centered, and add no other text.

visual: ${visual}

slide text:
${displayText}`.trim();
}
