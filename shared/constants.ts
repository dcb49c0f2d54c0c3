export const DEFAULT_TEMPERATURE = 0.8;
export const DEFAULT_TEXT_TIMEOUT_MS = 120000;
export const DEFAULT_IMAGE_VARIANTS = 2;
export const DEFAULT_THEME_DELAY_MS = 5000;

// Model Constants
export const MODEL_SLIDE_GENERATION = "gemini-3-flash-preview";
export const MODEL_IMAGE_GENERATION = "gemini-3-pro-image-preview";

// Generator output format
export const SLIDE_DELIMITER = "---";
export const FAILURE_SENTINEL = "GENERATION_FAILED";

// Output images are portrait 9:16 (carousel format)
export const IMAGE_ASPECT_RATIO = "9:16";
export const PLACEHOLDER_WIDTH = 1080;
export const PLACEHOLDER_HEIGHT = 1920;
export const PLACEHOLDER_BACKGROUND = "#AAAAAA";
export const PLACEHOLDER_TEXT_COLOR = "#1F1F1F";

export const MANIFEST_FILENAME = "slides.csv";
export const RAW_TEXT_FILENAME = "raw.md";
export const INPUT_THEME_COLUMN = "Theme";

export const MONTH_NAMES = [
  "January",
  "February",
  "March",
  "April",
  "May",
  "June",
  "July",
  "August",
  "September",
  "October",
  "November",
  "December",
] as const;

export const CHARACTER_CLASSES = [
  "Barbarian",
  "Bard",
  "Cleric",
  "Druid",
  "Fighter",
  "Monk",
  "Paladin",
  "Ranger",
  "Rogue",
  "Sorcerer",
  "Warlock",
  "Wizard",
  "Artificer",
] as const;

// Image Generation Style Guidelines
export const ART_STYLE = `
Retro Sci-Fi Anime Aesthetic:
- Vintage, nostalgic anime style of late '70s and '80s sci-fi, reminiscent of classic anime films and Franco-Belgian comics.

Limited Color Palette:
- Muted, pastel-like colors and warm earth tones (soft yellows, oranges, beige) with contrasting darker outlines.

Strong Outlines & Detailed Line Work:
- Bold outlines and careful linework with visible texture and shading, especially on mechanical details.

Minimalistic Backgrounds & Composition:
- Simple backgrounds that keep attention on the featured characters, creatures or objects.

Setting:
- Fantasy tabletop adventure (dungeons, taverns, wilderness), never futuristic.
`;
