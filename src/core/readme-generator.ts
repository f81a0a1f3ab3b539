import { renderTemplate } from '../utils/template.js';
import type { ReadmeChecks, StudentInfo } from './types.js';

export const DEFAULT_CONTACT_EMAIL = 'your.email@domain';

export const DEFAULT_HOW_TO_RUN = `1. Install dependencies:
   \`\`\`bash
   npm install
   \`\`\`

2. Print the submission plan:
   \`\`\`bash
   npx handin plan --repo_path .
   \`\`\``;

const README_TEMPLATE = `# Assignment Submission - Deliverables

**Student:** {{name}}  
**University:** {{university}}  
**Department:** {{department}}  

## Repository
{{repoUrl}}

## Deliverables included
{{#each deliverables}}- {{this}}
{{/each}}
{{#if howToRun}}## How to run
{{howToRun}}
{{else}}## How to run (quick)
{{defaultHowToRun}}
{{/if}}
## Contact
{{name}} - [{{contactEmail}}](mailto:{{contactEmail}})
`;

export interface ReadmeInput {
  student: StudentInfo;
  deliverables: readonly string[];
  /** Falls back to `student.repoUrl`. */
  repoUrl?: string;
  howToRun?: string;
  contactEmail?: string;
}

export function generateReadme(input: ReadmeInput): string {
  const { student } = input;
  const contactEmail = input.contactEmail || DEFAULT_CONTACT_EMAIL;

  return renderTemplate(README_TEMPLATE, {
    name: student.name,
    university: student.university,
    department: student.department,
    repoUrl: input.repoUrl ?? student.repoUrl,
    deliverables: [...input.deliverables],
    howToRun: input.howToRun ?? '',
    defaultHowToRun: DEFAULT_HOW_TO_RUN,
    contactEmail,
  });
}

/** Keyword self-check of generated content; plain substring matches. */
export function validateReadme(content: string, student: StudentInfo): ReadmeChecks {
  return {
    hasStudentName: content.includes(student.name),
    hasUniversity: content.includes(student.university),
    hasDepartment: content.includes(student.department),
    hasDeliverablesSection: content.includes('Deliverables'),
    hasHowToRun: content.includes('How to run'),
    hasContact: content.includes('Contact'),
  };
}
