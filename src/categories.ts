import type { CategoryDefinition } from "./assessmentTypes";

export const SKILL_CATEGORIES = [
  "Core Employability Skills",
  "Soft Skills",
  "Professional Skills",
  "AI Literacy",
  "Domain-Specific Skills",
  "Job Application Skills",
  "Entrepreneurial Skills",
  "Project Management Skills",
] as const;

export type SkillCategory = (typeof SKILL_CATEGORIES)[number];

type CategoryMeta = Omit<CategoryDefinition, "id">;

const CATEGORY_DETAILS: Record<SkillCategory, CategoryMeta> = {
  "Core Employability Skills": {
    description: "Basic skills required for employment",
    focusAreas: ["Problem Solving", "Time Management", "Critical Thinking", "Adaptability"],
    weight: 1.2,
  },
  "Soft Skills": {
    description: "Interpersonal and communication abilities",
    focusAreas: ["Communication", "Teamwork", "Leadership", "Emotional Intelligence"],
    weight: 1.0,
  },
  "Professional Skills": {
    description: "Skills specific to professional workplace",
    focusAreas: ["Business Ethics", "Professional Communication", "Work Ethics", "Industry Knowledge"],
    weight: 1.1,
  },
  "AI Literacy": {
    description: "Understanding and working with AI technologies",
    focusAreas: ["AI Basics", "AI Tools", "Data Understanding", "AI Ethics"],
    weight: 1.0,
  },
  "Domain-Specific Skills": {
    description: "Technical skills for specific field",
    focusAreas: ["Technical Knowledge", "Industry Tools", "Best Practices", "Technical Problem Solving"],
    weight: 1.2,
  },
  "Job Application Skills": {
    description: "Skills for job search and application",
    focusAreas: ["Resume Writing", "Interview Skills", "Personal Branding", "Job Search Strategies"],
    weight: 1.0,
  },
  "Entrepreneurial Skills": {
    description: "Skills for business and innovation",
    focusAreas: ["Innovation", "Risk Management", "Business Planning", "Market Analysis"],
    weight: 0.9,
  },
  "Project Management Skills": {
    description: "Skills for managing projects and teams",
    focusAreas: ["Project Planning", "Team Management", "Risk Assessment", "Resource Allocation"],
    weight: 1.0,
  },
};

export const DEFAULT_CATALOG: readonly CategoryDefinition[] = SKILL_CATEGORIES.map((id) => ({
  id,
  ...CATEGORY_DETAILS[id],
}));

export const STUDENT_YEARS = ["1st Year", "2nd Year", "3rd Year", "4th Year"] as const;

export function findCategory(catalog: readonly CategoryDefinition[], id: string): CategoryDefinition | null {
  return catalog.find((c) => c.id === id) ?? null;
}

export function listCategoryIds(catalog: readonly CategoryDefinition[]): string[] {
  return catalog.map((c) => c.id);
}
