// Prompt wording lives here so it can be tuned without touching the builder.

export function knowledgeTreePrompt(topic: string, content: string): string {
  return `You are a knowledge organizer building a structured knowledge tree about "${topic}".

Work only from the source material below:

${content}

Build the tree as follows:
1. The main topic is "${topic}".
2. Identify 3-5 major subtopics.
3. For each subtopic, list 3-5 key points or concepts.
4. Explain each key point in 1-2 sentences.

Respond with a single JSON object of this shape:
{
  "topic": "${topic}",
  "subtopics": [
    {
      "name": "Subtopic name",
      "key_points": [
        { "point": "Key point", "explanation": "Short explanation of the key point" }
      ]
    }
  ]
}

Cover the most important aspects of the topic.`;
}

export function expansionPrompt(topic: string, subtopic: string, content: string): string {
  return `You are a knowledge organizer writing a detailed expansion of the subtopic "${subtopic}" within the main topic "${topic}".

Work from the following material:

${content}

Structure the expansion as follows:
1. A brief overview of the subtopic (2-3 sentences).
2. 3-5 key aspects or components of the subtopic.
3. For each aspect, detailed information (2-3 paragraphs).
4. Relevant examples, case studies or applications for each aspect, where there are any.

Respond with a single JSON object of this shape:
{
  "subtopic": "${subtopic}",
  "overview": "Brief overview",
  "aspects": [
    {
      "name": "Aspect name",
      "details": "Detailed information about the aspect",
      "examples": ["Example 1", "Example 2"]
    }
  ]
}

Keep the information accurate and well structured.`;
}
