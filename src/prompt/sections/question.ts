export function renderQuestionSection(question: string): string {
  if (question.trim().length === 0) return "";
  return `# Pergunta\n\n${question}`;
}
