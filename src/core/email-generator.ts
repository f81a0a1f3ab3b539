import { renderTemplate } from '../utils/template.js';
import type { StudentInfo } from './types.js';

export const DEFAULT_SUBJECT_PREFIX = 'Assignment Submission - Deliverables submitted';

const EMAIL_TEMPLATE = `To: {{recipients}}
Subject: {{subjectPrefix}} ({{name}})

Hello,

I have pushed all deliverables for the assignment to the following repository:
{{repoUrl}}

Student: {{name}}
University: {{university}}
Department: {{department}}

Deliverables included:
{{#each deliverables}}- {{this}}
{{/each}}
Please let me know if you need any additional information.

Regards,
{{name}}
`;

export interface EmailInput {
  student: StudentInfo;
  recipients: readonly string[];
  deliverables: readonly string[];
  subjectPrefix?: string;
}

export function generateEmailDraft(input: EmailInput): string {
  const { student } = input;

  return renderTemplate(EMAIL_TEMPLATE, {
    recipients: input.recipients.join(', '),
    subjectPrefix: input.subjectPrefix ?? DEFAULT_SUBJECT_PREFIX,
    name: student.name,
    university: student.university,
    department: student.department,
    repoUrl: student.repoUrl,
    deliverables: [...input.deliverables],
  });
}
