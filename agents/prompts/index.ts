export {
  PLAYBOOK_ANALYST_SYSTEM_PROMPT,
  createPlaybookAnalystPrompt,
} from './playbook-analyst'
