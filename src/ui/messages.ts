export function welcomeMessage(): string {
  return [
    "Hello! Welcome to the candidate screening assistant.",
    "",
    "I will help with your initial screening.",
    "I will gather some basic information about you and ask a few technical questions based on your expertise.",
    "",
    "This should take about 5-10 minutes and helps our recruitment team understand your background and skills.",
  ].join("\n");
}

export function namePrompt(): string {
  return "To get started, could you please tell me your full name?";
}

export function nameFailureMessage(): string {
  return `Thank you for your interest! ${namePrompt()}`;
}

export function nameAcceptedMessage(name: string): string {
  return `Nice to meet you, ${name}! Let me gather some information for your application. ${emailPrompt()}`;
}

export function emailPrompt(): string {
  return "Could you please provide your email address?";
}

export function emailFailureMessage(): string {
  return "I need a valid email address. Could you please provide your email?";
}

export function phonePrompt(): string {
  return "Perfect! Now, could you please provide your phone number?";
}

export function phoneFailureMessage(): string {
  return "Please provide a valid phone number (10 to 15 digits).";
}

export function experiencePrompt(): string {
  return "Great! How many years of professional experience do you have?";
}

export function experienceFailureMessage(): string {
  return "Please provide your years of experience as a number (e.g., 3, 5, 10).";
}

export function positionPrompt(): string {
  return "Excellent! What position(s) are you interested in applying for?";
}

export function positionFailureMessage(): string {
  return "Please tell me which position(s) you are interested in.";
}

export function locationPrompt(): string {
  return "Thank you! What's your current location (city, state/country)?";
}

export function locationFailureMessage(): string {
  return "Please tell me your current location (city, state/country).";
}

export function techStackPrompt(): string {
  return [
    "Almost there! Please list your tech stack: the programming languages, frameworks, databases, and tools you're proficient in.",
    "You can separate them with commas.",
  ].join(" ");
}

export function techStackFailureMessage(): string {
  return "Please provide your technical skills (e.g., Python, React, MySQL, Docker).";
}

export function techStackRecordedMessage(techStack: ReadonlyArray<string>): string {
  return `Perfect! I've recorded your tech stack: ${techStack.join(", ")}.`;
}

export function firstQuestionMessage(techStack: ReadonlyArray<string>, question: string): string {
  return [
    techStackRecordedMessage(techStack),
    "",
    "Now I'd like to ask you some technical questions based on your tech stack. Here's the first question:",
    "",
    `1. ${question}`,
  ].join("\n");
}

export function nextQuestionMessage(questionIndex: number, question: string): string {
  const number = questionIndex + 1;
  return `Thank you for your answer. Here's question ${number}:\n\n${number}. ${question}`;
}

export function conclusionMessage(): string {
  return [
    "Excellent! I've wrapped up the initial screening.",
    "",
    "Here's a summary of what we covered:",
    "• Personal information collected",
    "• Technical background assessed",
    "• Your responses have been recorded",
    "",
    "Our recruitment team will review your information and technical responses.",
    "You can expect to hear back from us within 2-3 business days.",
    "",
    "Is there anything else you'd like to know about the application process?",
  ].join("\n");
}

export function closingMessage(): string {
  return "Thank you for your time! If you have any questions about the process, feel free to reach out. Have a great day!";
}

export function farewellMessage(): string {
  return [
    "Thank you for your time and interest!",
    "",
    "Here's what happens next:",
    "• Your information has been recorded",
    "• Our recruitment team will review your responses",
    "• You'll hear back from us within 2-3 business days",
    "• If selected, we'll schedule a detailed interview",
    "",
    "Have a great day and good luck with your job search!",
  ].join("\n");
}

export function fallbackMessage(): string {
  return [
    "I'm sorry, I didn't quite understand that.",
    "Could you please rephrase your response? I'm here to help with your job application process.",
  ].join(" ");
}
