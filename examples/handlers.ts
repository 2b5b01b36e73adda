import type { StepHandler } from '../src';

/**
 * Referenced from steps.json as "handlers.askEmail"
 */
export const askEmail: StepHandler = (chatId, userInput, context, sender) => {
  const email = String(userInput).trim();
  if (!/\S+@\S+\.\S+/.test(email)) {
    sender.send(chatId, 'Please enter a valid email.');
    return ['ask_email', context];
  }

  sender.send(
    chatId,
    `Thanks ${String(context.name)}! We've recorded your email as ${email}.`
  );
  sender.send(chatId, 'Do you want to submit or start over?', {
    buttons: ['submit', 'restart'],
  });
  return ['confirm', { ...context, email }];
};

export const confirm: StepHandler = (chatId, userInput, context, sender) => {
  if (String(userInput).toLowerCase() === 'submit') {
    sender.send(chatId, 'Thank you!');
    return ['done', context];
  }
  sender.send(chatId, "Let's start over. What's your name?");
  return ['ask_name', {}];
};
