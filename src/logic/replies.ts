import { Language, LeadField, TopicId } from '../types';
import { TimeOfDay } from '../nlu/classifiers';

type Localized = Record<Language, string>;

const TOPIC_LABELS: Record<TopicId, Localized> = {
  pricing: { en: 'pricing', he: 'מחירים' },
  features: { en: 'what the bot can do', he: 'היכולות של הבוט' },
  setup: { en: 'the setup process', he: 'תהליך ההקמה' },
  integrations: { en: 'integrations', he: 'אינטגרציות' },
  support: { en: 'support', he: 'תמיכה' },
};

const FIELD_LABELS: Record<LeadField, Localized> = {
  name: { en: 'full name', he: 'שם מלא' },
  phone: { en: 'phone number', he: 'מספר טלפון' },
  email: { en: 'email address', he: 'כתובת מייל' },
};

const joinList = (items: string[], language: Language): string => {
  if (items.length <= 1) return items.join('');
  const last = items[items.length - 1];
  const head = items.slice(0, -1).join(', ');
  return language === 'he' ? `${head} ו${last}` : `${head} and ${last}`;
};

const OPENERS: Record<Exclude<TimeOfDay, undefined>, Localized> = {
  morning: { en: 'Good morning!', he: 'בוקר טוב!' },
  evening: { en: 'Good evening!', he: 'ערב טוב!' },
};

export const greetingReply = (language: Language, timeOfDay: TimeOfDay): string => {
  const opener = timeOfDay ? OPENERS[timeOfDay][language] : language === 'he' ? 'שלום!' : 'Hi there!';
  return language === 'he'
    ? `${opener} אני נובה מ-Nova Bots. אנחנו בונים צ'אטבוטים חכמים לעסקים. במה אפשר לעזור?`
    : `${opener} I'm Nova from Nova Bots. We build smart chatbots for businesses. How can I help you today?`;
};

export const clarifyReply = (language: Language): string =>
  language === 'he'
    ? 'אשמח לעזור! יש משהו ספציפי שתרצו לדעת על הבוטים שלנו?'
    : 'Happy to help! Is there something specific you would like to know about our chatbots?';

export const leadRequestReply = (language: Language): string =>
  language === 'he'
    ? 'מעולה! כדי שנחזור אליכם, אפשר לשלוח שם מלא, מספר טלפון וכתובת מייל?'
    : 'Great! So our team can get back to you, could you share your full name, phone number and email address?';

export const leadInvite = (language: Language): string =>
  language === 'he'
    ? 'רוצים שנציג יחזור אליכם? שלחו שם, טלפון ומייל.'
    : 'Would you like someone from our team to reach out? Just send your name, phone and email.';

export const leadThanksReply = (language: Language, name: string): string => {
  const first = name.split(' ')[0];
  return language === 'he'
    ? `תודה ${first}! קיבלנו את הפרטים ונציג יחזור אליכם בהקדם. בינתיים אפשר להמשיך לשאול כל שאלה.`
    : `Thank you ${first}! We received your details and someone from our team will contact you soon. Feel free to keep asking in the meantime.`;
};

export const leadAlreadyCollectedReply = (language: Language): string =>
  language === 'he'
    ? 'כבר קיבלנו את הפרטים שלכם ונציג יחזור אליכם בקרוב. יש עוד משהו שאפשר לעזור בו?'
    : 'We already have your details and our team will be in touch soon. Is there anything else I can help with?';

export const leadExitReply = (language: Language): string =>
  language === 'he'
    ? 'אין בעיה! אם תרצו, אפשר להמשיך לשאול כל שאלה.'
    : 'No problem! Feel free to ask me anything else.';

/**
 * Names what was missing or invalid, then asks for all three fields again:
 * a lead only counts when they arrive together.
 */
export const leadFieldsReply = (language: Language, missing: LeadField[], invalid: LeadField[]): string => {
  const parts: string[] = [];
  if (invalid.length) {
    const fields = joinList(invalid.map((field) => FIELD_LABELS[field][language]), language);
    parts.push(language === 'he' ? `נראה שה${fields} לא תקינים.` : `The ${fields} ${invalid.length > 1 ? "don't" : "doesn't"} look right.`);
  }
  if (missing.length) {
    const fields = joinList(missing.map((field) => FIELD_LABELS[field][language]), language);
    parts.push(language === 'he' ? `חסרים עדיין ${fields}.` : `I still need your ${fields}.`);
  }
  parts.push(
    language === 'he'
      ? 'אפשר לשלוח שם מלא, מספר טלפון וכתובת מייל יחד בהודעה אחת?'
      : 'Could you send your full name, phone number and email address together in one message?'
  );
  return parts.join(' ');
};

export const leadRetryLaterReply = (language: Language): string =>
  language === 'he'
    ? 'לא הצלחתי לקבל את כל הפרטים הפעם. כשתרצו, שלחו שם מלא, מספר טלפון וכתובת מייל בהודעה אחת ונציג יחזור אליכם.'
    : "I couldn't get all of your details this time. Whenever you're ready, send your full name, phone number and email address in one message and our team will reach out.";

export const apologyReply = (language: Language): string =>
  language === 'he'
    ? 'סליחה, לא הצלחתי לענות על זה כרגע. אפשר לשאול על המחירים, היכולות או תהליך ההקמה, או להשאיר פרטים ונחזור אליכם.'
    : "Sorry, I couldn't answer that right now. You can ask about pricing, features or the setup process, or leave your details and we'll get back to you.";

export const recapPrefix = (language: Language, topics: readonly TopicId[]): string => {
  const labels = joinList(topics.map((topic) => TOPIC_LABELS[topic][language]), language);
  return language === 'he' ? `כפי שציינתי קודם לגבי ${labels}:` : `As I mentioned earlier about ${labels}:`;
};
