export const DOCUMENTATION_PROMPT = [
  'Create a simple technical documentation page based on this video. ',
  'Keep it under 500 words, use easy language for beginners (noobs), explain any tech terms simply, and structure it in markdown with:\n',
  '- Title\n',
  '- Short intro (what this doc covers)\n',
  '- Step-by-step guide or key concepts from the video\n',
  '- Simple visuals descriptions\n',
  '- Quick tips for new users\n',
  '- Try to focus on pointer if the user is pointing to something in the video\n',
  '- Try to focus on the text if the user is writing something in the video\n',
  "DON'T include any code or words like Noobs or beginners or similar words.",
].join('');
