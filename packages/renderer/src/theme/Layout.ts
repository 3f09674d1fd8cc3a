import { type FunctionalComponent, type VNode, h, isVNode } from "vue";
import { MATHJAX_SRC, MERMAID_INIT } from "./scripts";

export interface PageLink {
  text: string;
  href: string;
}

export interface SidebarLink extends PageLink {
  active: boolean;
}

export interface PageData {
  lang: string;
  /** Document title, already combined with the site title. */
  title: string;
  /** Chapter title shown above the content when the body has no `# heading`. */
  heading: string | undefined;
  description: string | undefined;
  siteTitle: string;
  home: string;
  styles: string[];
  nav: PageLink[];
  repository: string | undefined;
  footer: string | undefined;
  chapters: SidebarLink[];
  prev: PageLink | undefined;
  next: PageLink | undefined;
  content: string;
  hasMath: boolean;
  hasMermaid: boolean;
}

const compact = (children: (VNode | false | undefined)[]): VNode[] => children.filter(isVNode);

const Head: FunctionalComponent<{ page: PageData }> = ({ page }) =>
  h(
    "head",
    compact([
      h("meta", { charset: "utf-8" }),
      h("meta", { name: "viewport", content: "width=device-width, initial-scale=1" }),
      h("title", page.title),
      page.description !== undefined && h("meta", { name: "description", content: page.description }),
      ...page.styles.map((href) => h("link", { rel: "stylesheet", href })),
      page.hasMath && h("script", { id: "MathJax-script", async: true, src: MATHJAX_SRC }),
      page.hasMermaid && h("script", { type: "module", innerHTML: MERMAID_INIT }),
    ]),
  );

const Header: FunctionalComponent<{ page: PageData }> = ({ page }) =>
  h(
    "header",
    { class: "site-header" },
    compact([
      h("a", { class: "site-title", href: page.home }, page.siteTitle),
      page.nav.length > 0 &&
        h(
          "nav",
          { class: "site-nav" },
          page.nav.map((item) => h("a", { href: item.href }, item.text)),
        ),
      page.repository !== undefined &&
        h("a", { class: "site-repository", href: page.repository }, "Source"),
    ]),
  );

const Sidebar: FunctionalComponent<{ chapters: SidebarLink[] }> = ({ chapters }) =>
  h("aside", { class: "sidebar" }, [
    h("nav", { "aria-label": "Chapters" }, [
      h(
        "ol",
        chapters.map((chapter) =>
          h("li", [
            chapter.active
              ? h("a", { href: chapter.href, class: "active", "aria-current": "page" }, chapter.text)
              : h("a", { href: chapter.href }, chapter.text),
          ]),
        ),
      ),
    ]),
  ]);

const Pager: FunctionalComponent<{ prev: PageLink | undefined; next: PageLink | undefined }> = ({
  prev,
  next,
}) =>
  h(
    "nav",
    { class: "pager" },
    compact([
      prev !== undefined && h("a", { class: "pager-prev", href: prev.href, rel: "prev" }, `← ${prev.text}`),
      next !== undefined && h("a", { class: "pager-next", href: next.href, rel: "next" }, `${next.text} →`),
    ]),
  );

export const Layout: FunctionalComponent<{ page: PageData }> = ({ page }) =>
  h("html", { lang: page.lang }, [
    h(Head, { page }),
    h("body", [
      h(
        "div",
        { class: "layout" },
        compact([
          h(Header, { page }),
          h(Sidebar, { chapters: page.chapters }),
          h("main", { class: "main" }, compact([
            h(
              "article",
              { class: "chapter" },
              compact([
                page.heading !== undefined && h("h1", { class: "chapter-title" }, page.heading),
                h("div", { class: "chapter-body", innerHTML: page.content }),
              ]),
            ),
            (page.prev !== undefined || page.next !== undefined) &&
              h(Pager, { prev: page.prev, next: page.next }),
          ])),
          page.footer !== undefined && h("footer", { class: "site-footer" }, page.footer),
        ]),
      ),
    ]),
  ]);
