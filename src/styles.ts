export const styles = {
  /** Default stylesheet for image pages, used when the book declares none. Must be suitable for epub readers and their quirks. */
  page: `@charset "UTF-8";

html, body {
  margin: 0;
  padding: 0;
  width: 100%;
  height: 100%;
  background-color: #fff;
}

body > div.main {
  margin: 0;
  padding: 0;
  width: 100%;
  height: 100%;
  text-align: center;
}

svg {
  display: block;
  margin: 0;
  padding: 0;
}
`,
};
