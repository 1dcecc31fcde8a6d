import i18next from "i18next";
import enGridfight from "../../locales/en/gridfight.json";

export const supportedLocales: string[] = ["en"];

export const addResource = (lang?: string) => {
    if (i18next.isInitialized) {
        // i18next already exists
        if (!i18next.hasResourceBundle("en", "gridfight")) {
            i18next.addResourceBundle("en", "gridfight", enGridfight);
        }
        if (lang) {
            void i18next.changeLanguage(lang);
        }
    } else {
        // i18next isn't in the host, so use it ourselves
        void i18next.init({
            lng: lang ?? "en",
            fallbackLng: "en",
            ns: ["gridfight"],
            defaultNS: "gridfight",
            initImmediate: false,
            resources: {
                en: {
                    gridfight: enGridfight,
                },
            },
        });
    }
    return i18next;
}

addResource();
