import type { PrayerId, SoundCategory } from "../types";
import { PRAYER_DISPLAY_NAMES } from "../types";

export interface MessageTemplate {
  id: string;
  title: string;
  content: string;
}

export const messageTemplates: Record<"adhan" | "prayer" | "sunrise" | "dhikr", MessageTemplate> = {
  adhan: {
    id: "adhan_default",
    title: "{name} Adhan",
    content: "Time for {name} prayer - {time}",
  },
  prayer: {
    id: "prayer_default",
    title: "{name} Prayer",
    content: "Time for {name} prayer - {time}",
  },
  sunrise: {
    id: "sunrise_default",
    title: "Sunrise",
    content: "Sunrise at {time} - the Fajr window has ended",
  },
  dhikr: {
    id: "dhikr_default",
    title: "Dhikr Reminder",
    content: "{phrase}",
  },
};

export const DHIKR_PHRASES = [
  "Subhanallah (Glory be to Allah)",
  "Alhamdulillah (All praise is due to Allah)",
  "Astaghfirullah (I seek forgiveness from Allah)",
  "Allahu Akbar (Allah is the Greatest)",
] as const;

/** Prayers announced with the adhan sound; the rest use the default tone. */
const ADHAN_PRAYERS: ReadonlySet<PrayerId> = new Set<PrayerId>(["dhuhr", "asr", "maghrib", "isha"]);

export function soundFor(prayerId: PrayerId): SoundCategory {
  return ADHAN_PRAYERS.has(prayerId) ? "adhan" : "default";
}

export class MessageTemplateService {
  formatTemplate(template: string, data: Record<string, string>): string {
    let message = template;
    for (const [key, value] of Object.entries(data)) {
      message = message.replace(new RegExp(`\\{${key}\\}`, "g"), value);
    }
    return message;
  }

  formatPrayerReminder(prayerId: PrayerId, time: string): { title: string; body: string } {
    const template =
      prayerId === "sunrise"
        ? messageTemplates.sunrise
        : soundFor(prayerId) === "adhan"
          ? messageTemplates.adhan
          : messageTemplates.prayer;
    const data = { name: PRAYER_DISPLAY_NAMES[prayerId], time };
    return {
      title: this.formatTemplate(template.title, data),
      body: this.formatTemplate(template.content, data),
    };
  }

  formatDhikrReminder(phraseIndex: number): { title: string; body: string } {
    const index = ((phraseIndex % DHIKR_PHRASES.length) + DHIKR_PHRASES.length) % DHIKR_PHRASES.length;
    const template = messageTemplates.dhikr;
    return {
      title: template.title,
      body: this.formatTemplate(template.content, { phrase: DHIKR_PHRASES[index] }),
    };
  }

  /** Single WhatsApp message for a reminder. */
  formatMessage(title: string, body: string): string {
    return `*${title}*\n${body}`;
  }
}

export default new MessageTemplateService();
