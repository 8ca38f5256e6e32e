/** Reference vocabulary offered to the oracle. Its answers are not limited to it. */
export const REFERENCE_CATEGORIES = [
  'Social Media',
  'News',
  'Video Streaming',
  'E-commerce',
  'Software Development',
  'Cloud Storage',
  'Communication',
  'Search Engine',
  'Phishing',
  'Malware',
  'Suspicious',
  'Encyclopedia',
  'Business',
  'Content Delivery Network',
  'Adult Content',
  'Pornography',
  'Healthcare',
  'Information Technology',
  'Travel',
  'Education',
  'Entertainment',
  'Shopping',
  'Vehicles',
  'Games',
  'Drugs',
  'AI/ML',
] as const;

export function buildCategorizationPrompt(domain: string): string {
  return [
    'You are a cybersecurity expert helping categorize website domains based on their most likely purpose or threat level.',
    `Use only one of the following category labels:\n${REFERENCE_CATEGORIES.map(c => `- ${c}`).join('\n')}`,
    [
      'Guidelines:',
      "- If the domain appears dangerous, contains misspellings, obscure TLDs, or is linked to harmful behavior, choose 'Malware' or 'Phishing'.",
      "- Use 'Malware' for domains likely hosting or distributing malicious software.",
      "- Use 'Phishing' for domains pretending to be legitimate to steal information.",
      "- Use 'Suspicious' for odd or generic domains that might be harmful but are not clearly phishing or malware.",
      "- If still unsure, return 'Unknown'.",
      '- Reply with the label only.',
    ].join('\n'),
    `Domain: ${domain}\nCategory:`,
  ].join('\n\n');
}
